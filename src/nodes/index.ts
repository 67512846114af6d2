import type { NodeKind } from "../graph/types";
import type { NodeModule } from "../types/nodeModule";
import { analyserNode } from "./analyser";
import { biquadFilterNode } from "./biquadFilter";
import { bufferSourceNode } from "./bufferSource";
import { channelMergerNode } from "./channelMerger";
import { channelSplitterNode } from "./channelSplitter";
import { convolverNode } from "./convolver";
import { delayNode } from "./delay";
import { dynamicsCompressorNode } from "./dynamicsCompressor";
import { gainNode } from "./gain";
import { mediaElementSourceNode } from "./mediaElementSource";
import { mediaStreamDestinationNode } from "./mediaStreamDestination";
import { mediaStreamSourceNode } from "./mediaStreamSource";
import { oscillatorNode } from "./oscillator";
import { pannerNode } from "./panner";
import { stereoPannerNode } from "./stereoPanner";
import { waveShaperNode } from "./waveShaper";

export type NodeModuleMap = { readonly [K in NodeKind]: NodeModule<K> };

export const NODE_MODULES: NodeModuleMap = {
  analyser: analyserNode,
  biquadFilter: biquadFilterNode,
  bufferSource: bufferSourceNode,
  channelMerger: channelMergerNode,
  channelSplitter: channelSplitterNode,
  convolver: convolverNode,
  delay: delayNode,
  dynamicsCompressor: dynamicsCompressorNode,
  gain: gainNode,
  mediaElementSource: mediaElementSourceNode,
  mediaStreamDestination: mediaStreamDestinationNode,
  mediaStreamSource: mediaStreamSourceNode,
  oscillator: oscillatorNode,
  panner: pannerNode,
  stereoPanner: stereoPannerNode,
  waveShaper: waveShaperNode,
};
