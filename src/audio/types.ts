import type { AudioContextLike } from "@/types/audioRuntime";
import { fetchArrayBuffer } from "./assetCache";
import type { FetchAsset } from "./assetCache";

/** Engine configuration. Every field has a default in `DEFAULT_ENGINE_OPTIONS`. */
export type EngineOptions = Readonly<{
  /** Milliseconds between tick events (default: 40) */
  tickIntervalMs: number;

  /** Builds the audio context on first use. Throwing disables the engine. */
  createContext: () => AudioContextLike;

  /** Fetches asset bytes (default: global `fetch`) */
  fetchAsset: FetchAsset;

  /** Looks up the element behind a `mediaElementSource` node */
  resolveMediaElement: (id: string) => HTMLMediaElement | null;

  /** Looks up the stream behind a `mediaStreamSource` node */
  resolveMediaStream: (id: string) => MediaStream | null;
}>;

function elementById(id: string): HTMLMediaElement | null {
  if (typeof document === "undefined") return null;
  const el = document.getElementById(id);
  return el instanceof HTMLMediaElement ? el : null;
}

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  tickIntervalMs: 40,
  createContext: () => new AudioContext(),
  fetchAsset: fetchArrayBuffer,
  resolveMediaElement: elementById,
  resolveMediaStream: () => null,
};
