export { NativeWhisperSTT } from './stt';
export { NativeSherpaOnnxTTS } from './tts';
