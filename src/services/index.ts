export { TextNormalizer, stripEmphasis } from './text-normalizer';
export { AudioPlayer, ClipPlayable, playerCommand } from './audio-player';
export type { ClipFormat, AudioPlayerOptions } from './audio-player';
export { SpeechOutput } from './speech-output';
export type { SpeechOutputConfig } from './speech-output';
export { TurnLogger, getDefaultLogger } from './turn-logger';
export type { TurnLogEvent, TurnLoggerOptions } from './turn-logger';
