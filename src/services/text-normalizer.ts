/**
 * Text Normalizer
 * Converts response text to a TTS-friendly form
 */

import numberToWords from 'number-to-words';
const { toWords, toWordsOrdinal } = numberToWords;

const DIGIT_WORDS = ['zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine'];

function spellDigits(digits: string): string {
  return digits.split('').map((d) => DIGIT_WORDS[Number(d)]).join(' ');
}

/** Digit runs past the safe integer range are read one digit at a time */
function cardinal(digits: string): string {
  const value = parseInt(digits, 10);
  return Number.isSafeInteger(value) ? toWords(value) : spellDigits(digits);
}

function ordinal(digits: string): string {
  const value = parseInt(digits, 10);
  return Number.isSafeInteger(value) ? toWordsOrdinal(value) : spellDigits(digits);
}

/** Remove the markdown bold delimiter */
export function stripEmphasis(text: string): string {
  return text.replaceAll('**', '');
}

export class TextNormalizer {
  normalize(text: string): string {
    let result = stripEmphasis(text);
    result = this.normalizeListItems(result);
    result = this.normalizeTimes(result);
    result = this.normalizeDecimalNumbers(result);
    result = this.normalizeOrdinals(result);
    result = this.normalizeCurrency(result);
    result = this.normalizePercentages(result);
    result = this.normalizeStandaloneNumbers(result);
    result = this.normalizeSymbols(result);
    result = this.normalizePunctuation(result);
    result = result.replace(/\s+/g, ' ').trim();
    return result;
  }

  /** "- buy milk" lines become spoken sentences */
  private normalizeListItems(text: string): string {
    return text
      .split('\n')
      .map((line) => line.replace(/^\s*[-*•]\s+/, '').trim())
      .filter((line) => line.length > 0)
      .map((line) => (/[.!?]$/.test(line) ? line : `${line}.`))
      .join(' ');
  }

  private normalizeTimes(text: string): string {
    return text.replace(
      /\b(\d{1,2}):(\d{2})\s*(AM|PM|am|pm)?\b/g,
      (_, hourStr: string, minuteStr: string, period: string | undefined) => {
        const hour = parseInt(hourStr, 10);
        const minute = parseInt(minuteStr, 10);
        const hourWord = toWords(hour);
        const minuteWord = minute === 0 ? '' : minute < 10 ? 'oh ' + toWords(minute) : toWords(minute);
        const periodWord = period ? ' ' + period.toUpperCase().split('').join(' ') : '';
        return (hourWord + ' ' + minuteWord + periodWord).replace(/\s+/g, ' ').trim();
      }
    );
  }

  private normalizeDecimalNumbers(text: string): string {
    return text.replace(/(\d+)\.(\d+)/g, (_, whole: string, decimal: string) => {
      return `${cardinal(whole)} point ${spellDigits(decimal)}`;
    });
  }

  private normalizeOrdinals(text: string): string {
    return text.replace(/(\d+)(st|nd|rd|th)\b/gi, (_, num: string) => ordinal(num));
  }

  private normalizeCurrency(text: string): string {
    return text.replace(/\$(\d+)\b/g, (_, dollars: string) => {
      return cardinal(dollars) + (parseInt(dollars, 10) === 1 ? ' dollar' : ' dollars');
    });
  }

  private normalizePercentages(text: string): string {
    return text.replace(/(\d+)%/g, (_, num: string) => cardinal(num) + ' percent');
  }

  private normalizeStandaloneNumbers(text: string): string {
    return text.replace(/\b(\d+)\b/g, (match) => cardinal(match));
  }

  private normalizeSymbols(text: string): string {
    return text
      .replace(/&/g, ' and ')
      .replace(/@/g, ' at ')
      .replace(/\+/g, ' plus ')
      .replace(/=/g, ' equals ')
      .replace(/#/g, ' number ');
  }

  private normalizePunctuation(text: string): string {
    return text
      .replace(/\.\.\./g, ', ')
      .replace(/[;:]/g, ', ')
      .replace(/[()[\]{}<>]/g, ' ')
      .replace(/["“”«»]/g, '')
      .replace(/(?<!\w)['‘’]|['‘’](?!\w)/g, '')
      .replace(/[*_~`]/g, '')
      .replace(/-/g, ' ');
  }
}
