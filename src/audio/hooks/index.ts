export { useAudioGraph } from "./useAudioGraph";
export type { UseAudioGraphOptions } from "./useAudioGraph";
