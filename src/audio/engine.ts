import { GraphFormatError } from "@graph/errors";
import type { Graph } from "@graph/types";
import { decodeGraph } from "@project/wireFormat";
import { clampPositive } from "@utils/math";
import { LiveGraphApplier } from "./applier";
import { AssetCache } from "./assetCache";
import { EngineEventBus } from "./events";
import type { EngineEventSubscriber } from "./events";
import { RenderLoop } from "./renderLoop";
import { DEFAULT_ENGINE_OPTIONS } from "./types";
import type { EngineOptions } from "./types";

/**
 * Host-facing entry point. A host element forwards its graph property, asset
 * list and lifecycle callbacks here and listens for `tick` and `progress` events.
 */
export class AudioEngine {
  readonly assets: AssetCache;
  readonly applier: LiveGraphApplier;
  private readonly loop: RenderLoop;
  private readonly events = new EngineEventBus();
  private readonly stopProgress: () => void;

  constructor(options: Partial<EngineOptions> = {}) {
    const opts: EngineOptions = { ...DEFAULT_ENGINE_OPTIONS, ...options };

    this.assets = new AssetCache({
      fetchAsset: opts.fetchAsset,
      decode: async (bytes) => {
        const ctx = this.applier.ensureContext();
        if (!ctx) throw new Error("audio runtime unavailable");
        return await ctx.decodeAudioData(bytes);
      },
    });
    this.applier = new LiveGraphApplier({
      assets: this.assets,
      createContext: opts.createContext,
      resolveMediaElement: opts.resolveMediaElement,
      resolveMediaStream: opts.resolveMediaStream,
    });
    this.loop = new RenderLoop({
      intervalMs: clampPositive(opts.tickIntervalMs, DEFAULT_ENGINE_OPTIONS.tickIntervalMs),
      getTime: () => this.applier.currentTime(),
      onTick: (time) => this.events.emit({ type: "tick", time }),
    });
    this.stopProgress = this.assets.onChange((urls) => this.events.emit({ type: "progress", urls }));
  }

  setGraph(graph: Graph): void {
    this.applier.apply(graph);
  }

  /** Decode a wire-format document and apply it. */
  setGraphJson(json: unknown): void {
    const result = decodeGraph(json);
    if (!result.success) throw new GraphFormatError(result.error);
    this.setGraph(result.graph);
  }

  /** Start fetching and decoding `urls` ahead of any node that needs them. */
  setAssets(urls: ReadonlyArray<string>): void {
    if (!this.applier.ensureContext()) return;
    this.assets.preload(urls);
  }

  decodedAssets(): string[] {
    return this.assets.snapshot();
  }

  onEvent(fn: EngineEventSubscriber): () => void {
    return this.events.onEvent(fn);
  }

  onAttach(): void {
    this.applier.ensureContext();
    this.loop.start();
  }

  onDetach(): void {
    this.loop.stop();
  }

  dispose(): void {
    this.loop.stop();
    this.stopProgress();
    this.applier.dispose();
    this.events.clear();
  }
}
