import type {
  AnalyserNodeLike,
  AudioBufferLike,
  AudioBufferSourceNodeLike,
  AudioContextLike,
  AudioNodeLike,
  AudioParamLike,
  BiquadFilterNodeLike,
  ConvolverNodeLike,
  DelayNodeLike,
  DynamicsCompressorNodeLike,
  GainNodeLike,
  OscillatorNodeLike,
  PannerNodeLike,
  StereoPannerNodeLike,
  WaveShaperNodeLike,
} from "@/types/audioRuntime";

// In-process stand-in for an AudioContext. Every mutation the engine makes is
// appended to `ctx.log` as a short line, e.g. `gain#2.gain.value = 0.5` or
// `connect oscillator#1 -> gain#2`. Node labels are `<kind>#<creation order>`.

export class FakeAudioParam implements AudioParamLike {
  private current: number;

  constructor(
    readonly label: string,
    defaultValue: number,
    private readonly log: string[],
  ) {
    this.current = defaultValue;
  }

  get value(): number {
    return this.current;
  }

  set value(v: number) {
    this.current = v;
    this.log.push(`${this.label}.value = ${v}`);
  }

  setValueAtTime(value: number, startTime: number) {
    this.log.push(`${this.label}.setValueAtTime(${value}, ${startTime})`);
  }

  linearRampToValueAtTime(value: number, endTime: number) {
    this.log.push(`${this.label}.linearRampToValueAtTime(${value}, ${endTime})`);
  }

  exponentialRampToValueAtTime(value: number, endTime: number) {
    this.log.push(`${this.label}.exponentialRampToValueAtTime(${value}, ${endTime})`);
  }

  setTargetAtTime(target: number, startTime: number, timeConstant: number) {
    this.log.push(`${this.label}.setTargetAtTime(${target}, ${startTime}, ${timeConstant})`);
  }

  setValueCurveAtTime(values: Float32Array, startTime: number, duration: number) {
    this.log.push(`${this.label}.setValueCurveAtTime([${Array.from(values).join(", ")}], ${startTime}, ${duration})`);
  }

  cancelScheduledValues(cancelTime: number) {
    this.log.push(`${this.label}.cancelScheduledValues(${cancelTime})`);
  }
}

function labelOf(target: AudioNodeLike | AudioParamLike): string {
  if (target instanceof FakeAudioNode || target instanceof FakeAudioParam) return target.label;
  return "?";
}

export class FakeAudioNode implements AudioNodeLike {
  readonly connections: Array<AudioNodeLike | AudioParamLike> = [];
  readonly params = new Map<string, FakeAudioParam>();

  constructor(
    readonly label: string,
    protected readonly log: string[],
  ) {}

  protected param(name: string, defaultValue: number): FakeAudioParam {
    const p = new FakeAudioParam(`${this.label}.${name}`, defaultValue, this.log);
    this.params.set(name, p);
    return p;
  }

  connect(destination: AudioNodeLike | AudioParamLike) {
    this.connections.push(destination);
    this.log.push(`connect ${this.label} -> ${labelOf(destination)}`);
    return destination;
  }

  disconnect(destination?: AudioNodeLike | AudioParamLike) {
    if (destination === undefined) {
      this.connections.length = 0;
      this.log.push(`disconnect ${this.label}`);
      return;
    }
    const idx = this.connections.indexOf(destination);
    if (idx === -1) throw new Error(`${this.label} is not connected to ${labelOf(destination)}`);
    this.connections.splice(idx, 1);
    this.log.push(`disconnect ${this.label} -> ${labelOf(destination)}`);
  }
}

class FakeScheduledSourceNode extends FakeAudioNode {
  startedAt: number | null = null;
  stoppedAt: number | null = null;

  start(when = 0) {
    if (this.startedAt !== null) throw new Error(`${this.label} already started`);
    this.startedAt = when;
    this.log.push(`start ${this.label} @${when}`);
  }

  stop(when = 0) {
    if (this.startedAt === null) throw new Error(`${this.label} not started`);
    this.stoppedAt = when;
    this.log.push(`stop ${this.label} @${when}`);
  }
}

export class FakeGainNode extends FakeAudioNode implements GainNodeLike {
  readonly gain = this.param("gain", 1);
}

export class FakeOscillatorNode extends FakeScheduledSourceNode implements OscillatorNodeLike {
  type: OscillatorType = "sine";
  readonly frequency = this.param("frequency", 440);
  readonly detune = this.param("detune", 0);
}

export class FakeBufferSourceNode extends FakeScheduledSourceNode implements AudioBufferSourceNodeLike {
  buffer: AudioBufferLike | null = null;
  loop = false;
  loopStart = 0;
  loopEnd = 0;
  readonly detune = this.param("detune", 0);
  readonly playbackRate = this.param("playbackRate", 1);
}

export class FakeBiquadFilterNode extends FakeAudioNode implements BiquadFilterNodeLike {
  type: BiquadFilterType = "lowpass";
  readonly frequency = this.param("frequency", 350);
  readonly detune = this.param("detune", 0);
  readonly Q = this.param("Q", 1);
  readonly gain = this.param("gain", 0);
}

export class FakeDelayNode extends FakeAudioNode implements DelayNodeLike {
  readonly delayTime = this.param("delayTime", 0);

  constructor(
    label: string,
    log: string[],
    readonly maxDelayTime: number,
  ) {
    super(label, log);
  }
}

export class FakeConvolverNode extends FakeAudioNode implements ConvolverNodeLike {
  buffer: AudioBufferLike | null = null;
  normalize = true;
}

export class FakeDynamicsCompressorNode extends FakeAudioNode implements DynamicsCompressorNodeLike {
  readonly threshold = this.param("threshold", -24);
  readonly knee = this.param("knee", 30);
  readonly ratio = this.param("ratio", 12);
  readonly attack = this.param("attack", 0.003);
  readonly release = this.param("release", 0.25);
}

export class FakeAnalyserNode extends FakeAudioNode implements AnalyserNodeLike {
  fftSize = 2048;
  minDecibels = -100;
  maxDecibels = -30;
  smoothingTimeConstant = 0.8;
}

export class FakePannerNode extends FakeAudioNode implements PannerNodeLike {
  coneInnerAngle = 360;
  coneOuterAngle = 360;
  coneOuterGain = 0;
  distanceModel: DistanceModelType = "inverse";
  panningModel: PanningModelType = "equalpower";
  maxDistance = 10000;
  refDistance = 1;
  rolloffFactor = 1;
  readonly positionX = this.param("positionX", 0);
  readonly positionY = this.param("positionY", 0);
  readonly positionZ = this.param("positionZ", 0);
  readonly orientationX = this.param("orientationX", 1);
  readonly orientationY = this.param("orientationY", 0);
  readonly orientationZ = this.param("orientationZ", 0);
}

export class FakeStereoPannerNode extends FakeAudioNode implements StereoPannerNodeLike {
  readonly pan = this.param("pan", 0);
}

export class FakeWaveShaperNode extends FakeAudioNode implements WaveShaperNodeLike {
  curve: Float32Array | null = null;
  oversample: OverSampleType = "none";
}

export class FakeChannelNode extends FakeAudioNode {
  constructor(
    label: string,
    log: string[],
    readonly channels: number,
  ) {
    super(label, log);
  }
}

export const FAKE_BUFFER: AudioBufferLike = {
  duration: 1,
  length: 44100,
  numberOfChannels: 2,
  sampleRate: 44100,
};

export class FakeAudioContext implements AudioContextLike {
  readonly log: string[] = [];
  readonly nodes: FakeAudioNode[] = [];
  readonly destination = new FakeAudioNode("destination", this.log);
  currentTime = 0;
  decodeCalls = 0;
  closeCalls = 0;
  /** Replace to make decoding fail or return something else. */
  decode: (bytes: ArrayBuffer) => Promise<AudioBufferLike> = async () => FAKE_BUFFER;

  async decodeAudioData(audioData: ArrayBuffer): Promise<AudioBufferLike> {
    this.decodeCalls++;
    return await this.decode(audioData);
  }

  close: () => Promise<void> = async () => {
    this.closeCalls++;
  };

  /** Nodes created so far that are instances of `cls`, in creation order. */
  created<T extends FakeAudioNode>(cls: new (...args: never[]) => T): T[] {
    return this.nodes.filter((n): n is T => n instanceof cls);
  }

  find(label: string): FakeAudioNode | null {
    return this.nodes.find((n) => n.label === label) ?? null;
  }

  /** Current connections as `source -> target` lines, sorted. */
  edges(): string[] {
    const out: string[] = [];
    for (const node of this.nodes) {
      for (const target of node.connections) out.push(`${node.label} -> ${labelOf(target)}`);
    }
    return out.sort();
  }

  private track<T extends FakeAudioNode>(make: (label: string) => T, kind: string): T {
    const node = make(`${kind}#${this.nodes.length + 1}`);
    this.nodes.push(node);
    this.log.push(`create ${node.label}`);
    return node;
  }

  createGain() {
    return this.track((l) => new FakeGainNode(l, this.log), "gain");
  }

  createOscillator() {
    return this.track((l) => new FakeOscillatorNode(l, this.log), "oscillator");
  }

  createBufferSource() {
    return this.track((l) => new FakeBufferSourceNode(l, this.log), "bufferSource");
  }

  createBiquadFilter() {
    return this.track((l) => new FakeBiquadFilterNode(l, this.log), "biquadFilter");
  }

  createDelay(maxDelayTime = 1) {
    return this.track((l) => new FakeDelayNode(l, this.log, maxDelayTime), "delay");
  }

  createConvolver() {
    return this.track((l) => new FakeConvolverNode(l, this.log), "convolver");
  }

  createDynamicsCompressor() {
    return this.track((l) => new FakeDynamicsCompressorNode(l, this.log), "dynamicsCompressor");
  }

  createAnalyser() {
    return this.track((l) => new FakeAnalyserNode(l, this.log), "analyser");
  }

  createPanner() {
    return this.track((l) => new FakePannerNode(l, this.log), "panner");
  }

  createStereoPanner() {
    return this.track((l) => new FakeStereoPannerNode(l, this.log), "stereoPanner");
  }

  createWaveShaper() {
    return this.track((l) => new FakeWaveShaperNode(l, this.log), "waveShaper");
  }

  createChannelMerger(numberOfInputs = 6) {
    return this.track((l) => new FakeChannelNode(l, this.log, numberOfInputs), "channelMerger");
  }

  createChannelSplitter(numberOfOutputs = 6) {
    return this.track((l) => new FakeChannelNode(l, this.log, numberOfOutputs), "channelSplitter");
  }

  createMediaElementSource(_mediaElement: HTMLMediaElement) {
    return this.track((l) => new FakeAudioNode(l, this.log), "mediaElementSource");
  }

  createMediaStreamSource(_mediaStream: MediaStream) {
    return this.track((l) => new FakeAudioNode(l, this.log), "mediaStreamSource");
  }

  createMediaStreamDestination() {
    return this.track((l) => new FakeAudioNode(l, this.log), "mediaStreamDestination");
  }
}
