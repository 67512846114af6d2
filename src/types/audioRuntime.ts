import type { NodeKind, NodeProps, ParamDestination } from "../graph/types";

// Structural views of the Web Audio objects the engine drives. A real
// `AudioContext` satisfies `AudioContextLike`; tests use an in-process fake.

export interface AudioParamLike {
  value: number;
  setValueAtTime(value: number, startTime: number): unknown;
  linearRampToValueAtTime(value: number, endTime: number): unknown;
  exponentialRampToValueAtTime(value: number, endTime: number): unknown;
  setTargetAtTime(target: number, startTime: number, timeConstant: number): unknown;
  setValueCurveAtTime(values: Float32Array, startTime: number, duration: number): unknown;
  cancelScheduledValues(cancelTime: number): unknown;
}

export interface AudioNodeLike {
  connect(destination: AudioNodeLike | AudioParamLike): unknown;
  disconnect(destination?: AudioNodeLike | AudioParamLike): void;
}

export interface AudioBufferLike {
  readonly duration: number;
  readonly length: number;
  readonly numberOfChannels: number;
  readonly sampleRate: number;
}

export interface ScheduledSourceNodeLike extends AudioNodeLike {
  start(when?: number): void;
  stop(when?: number): void;
}

export interface GainNodeLike extends AudioNodeLike {
  readonly gain: AudioParamLike;
}

export interface OscillatorNodeLike extends ScheduledSourceNodeLike {
  type: OscillatorType;
  readonly frequency: AudioParamLike;
  readonly detune: AudioParamLike;
}

export interface AudioBufferSourceNodeLike extends ScheduledSourceNodeLike {
  buffer: AudioBufferLike | null;
  loop: boolean;
  loopStart: number;
  loopEnd: number;
  readonly detune: AudioParamLike;
  readonly playbackRate: AudioParamLike;
}

export interface BiquadFilterNodeLike extends AudioNodeLike {
  type: BiquadFilterType;
  readonly frequency: AudioParamLike;
  readonly detune: AudioParamLike;
  readonly Q: AudioParamLike;
  readonly gain: AudioParamLike;
}

export interface DelayNodeLike extends AudioNodeLike {
  readonly delayTime: AudioParamLike;
}

export interface ConvolverNodeLike extends AudioNodeLike {
  buffer: AudioBufferLike | null;
  normalize: boolean;
}

export interface DynamicsCompressorNodeLike extends AudioNodeLike {
  readonly threshold: AudioParamLike;
  readonly knee: AudioParamLike;
  readonly ratio: AudioParamLike;
  readonly attack: AudioParamLike;
  readonly release: AudioParamLike;
}

export interface AnalyserNodeLike extends AudioNodeLike {
  fftSize: number;
  minDecibels: number;
  maxDecibels: number;
  smoothingTimeConstant: number;
}

export interface PannerNodeLike extends AudioNodeLike {
  coneInnerAngle: number;
  coneOuterAngle: number;
  coneOuterGain: number;
  distanceModel: DistanceModelType;
  panningModel: PanningModelType;
  maxDistance: number;
  refDistance: number;
  rolloffFactor: number;
  readonly positionX: AudioParamLike;
  readonly positionY: AudioParamLike;
  readonly positionZ: AudioParamLike;
  readonly orientationX: AudioParamLike;
  readonly orientationY: AudioParamLike;
  readonly orientationZ: AudioParamLike;
}

export interface StereoPannerNodeLike extends AudioNodeLike {
  readonly pan: AudioParamLike;
}

export interface WaveShaperNodeLike extends AudioNodeLike {
  curve: Float32Array | null;
  oversample: OverSampleType;
}

export interface AudioContextLike {
  readonly currentTime: number;
  readonly destination: AudioNodeLike;
  decodeAudioData(audioData: ArrayBuffer): Promise<AudioBufferLike>;
  close(): Promise<void>;
  createGain(): GainNodeLike;
  createOscillator(): OscillatorNodeLike;
  createBufferSource(): AudioBufferSourceNodeLike;
  createBiquadFilter(): BiquadFilterNodeLike;
  createDelay(maxDelayTime?: number): DelayNodeLike;
  createConvolver(): ConvolverNodeLike;
  createDynamicsCompressor(): DynamicsCompressorNodeLike;
  createAnalyser(): AnalyserNodeLike;
  createPanner(): PannerNodeLike;
  createStereoPanner(): StereoPannerNodeLike;
  createWaveShaper(): WaveShaperNodeLike;
  createChannelMerger(numberOfInputs?: number): AudioNodeLike;
  createChannelSplitter(numberOfOutputs?: number): AudioNodeLike;
  createMediaElementSource(mediaElement: HTMLMediaElement): AudioNodeLike;
  createMediaStreamSource(mediaStream: MediaStream): AudioNodeLike;
  createMediaStreamDestination(): AudioNodeLike;
}

export type AudioNodeInstance<K extends NodeKind = NodeKind> = {
  readonly kind: K;
  /** Target of default-input connections; null for sources. */
  readonly input: AudioNodeLike | null;
  /** Source of outgoing connections; null for sinks. */
  readonly output: AudioNodeLike | null;
  getParam(name: ParamDestination): AudioParamLike | null;
  /** Apply a changed definition in place. Only fields that differ from `prev` are written. */
  update(next: NodeProps<K>, prev: NodeProps<K>): void;
  onRemove(): void;
};

export type AudioNodeServices = Readonly<{
  /** Decoded buffer for a URL, or null while it is still loading. */
  getBuffer: (url: string) => AudioBufferLike | null;
  resolveMediaElement: (id: string) => HTMLMediaElement | null;
  resolveMediaStream: (id: string) => MediaStream | null;
}>;

export type AudioNodeFactory<K extends NodeKind = NodeKind> = Readonly<{
  kind: K;
  create: (
    ctx: AudioContextLike,
    props: NodeProps<K>,
    services: AudioNodeServices,
  ) => AudioNodeInstance<K>;
}>;
