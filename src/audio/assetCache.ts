import type { AudioBufferLike } from "@/types/audioRuntime";

export type AssetState = "absent" | "loading" | "loaded" | "decoding" | "decoded";

type AssetEntry =
  | { state: "loading" }
  | { state: "loaded"; bytes: ArrayBuffer }
  | { state: "decoding" }
  | { state: "decoded"; buffer: AudioBufferLike };

export type FetchAsset = (url: string) => Promise<ArrayBuffer>;
export type DecodeAsset = (bytes: ArrayBuffer) => Promise<AudioBufferLike>;
export type DecodedSetListener = (decoded: ReadonlyArray<string>) => void;

export async function fetchArrayBuffer(url: string): Promise<ArrayBuffer> {
  const res = await fetch(url);
  if (!res.ok) throw new Error(`HTTP ${res.status} ${res.statusText}`.trim());
  return await res.arrayBuffer();
}

export type AssetCacheOptions = Readonly<{
  decode: DecodeAsset;
  fetchAsset?: FetchAsset;
}>;

/**
 * URL → decoded buffer, with at most one fetch and one decode in flight per URL.
 * Entries live for the life of the cache; a failed fetch or decode drops the
 * entry so the next `resolve` retries.
 */
export class AssetCache {
  private entries = new Map<string, AssetEntry>();
  private continuations = new Map<string, Set<() => void>>();
  private listeners = new Set<DecodedSetListener>();
  private readonly fetchAsset: FetchAsset;
  private readonly decode: DecodeAsset;

  constructor(options: AssetCacheOptions) {
    this.decode = options.decode;
    this.fetchAsset = options.fetchAsset ?? fetchArrayBuffer;
  }

  /** Decoded buffer for `url`, or null after making sure it is on its way. Never waits. */
  resolve(url: string): AudioBufferLike | null {
    if (!url) return null;
    const entry = this.entries.get(url);
    if (entry?.state === "decoded") return entry.buffer;
    if (entry) return null;

    this.entries.set(url, { state: "loading" });
    void this.load(url);
    return null;
  }

  preload(urls: Iterable<string>): void {
    for (const url of urls) this.resolve(url);
  }

  state(url: string): AssetState {
    return this.entries.get(url)?.state ?? "absent";
  }

  /** URLs whose buffers are decoded, in cache insertion order. */
  snapshot(): string[] {
    const out: string[] = [];
    for (const [url, entry] of this.entries) {
      if (entry.state === "decoded") out.push(url);
    }
    return out;
  }

  /** Run `fn` once, the next time `url` finishes decoding. */
  whenDecoded(url: string, fn: () => void): () => void {
    let fns = this.continuations.get(url);
    if (!fns) {
      fns = new Set();
      this.continuations.set(url, fns);
    }
    fns.add(fn);
    return () => {
      this.continuations.get(url)?.delete(fn);
    };
  }

  /** Subscribe to changes of the decoded set. */
  onChange(fn: DecodedSetListener): () => void {
    this.listeners.add(fn);
    return () => {
      this.listeners.delete(fn);
    };
  }

  private async load(url: string): Promise<void> {
    let bytes: ArrayBuffer;
    try {
      bytes = await this.fetchAsset(url);
    } catch (e) {
      this.fail(url, "fetch", e);
      return;
    }
    this.entries.set(url, { state: "loaded", bytes });
    await this.decodeLoaded(url);
  }

  private async decodeLoaded(url: string): Promise<void> {
    const entry = this.entries.get(url);
    if (entry?.state !== "loaded") return;
    this.entries.set(url, { state: "decoding" });

    let buffer: AudioBufferLike;
    try {
      buffer = await this.decode(entry.bytes);
    } catch (e) {
      this.fail(url, "decode", e);
      return;
    }
    this.entries.set(url, { state: "decoded", buffer });
    this.runContinuations(url);
    this.notify();
  }

  private fail(url: string, stage: "fetch" | "decode", error: unknown) {
    this.entries.delete(url);
    console.error(`[AssetCache] ${stage} failed for ${url}:`, error);
  }

  private runContinuations(url: string) {
    const fns = this.continuations.get(url);
    if (!fns) return;
    this.continuations.delete(url);
    for (const fn of fns) {
      try {
        fn();
      } catch (e) {
        console.error(`[AssetCache] continuation for ${url} failed:`, e);
      }
    }
  }

  private notify() {
    const decoded = this.snapshot();
    for (const fn of this.listeners) {
      try {
        fn(decoded);
      } catch (e) {
        console.error("[AssetCache] listener error:", e);
      }
    }
  }
}
