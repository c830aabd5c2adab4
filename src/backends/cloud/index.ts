export { CloudWhisperSTT } from './stt';
export { CloudSpeechTTS } from './tts';
