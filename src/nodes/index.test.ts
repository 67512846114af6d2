import { describe, it, expect } from "vitest";
import { getNodeModule, isNodeKind, kindFromWireTag, listNodeKinds } from "@graph/nodeRegistry";
import type { AudioNodeServices } from "@/types/audioRuntime";
import {
  FAKE_BUFFER,
  FakeAudioContext,
  FakeConvolverNode,
  FakePannerNode,
  FakeWaveShaperNode,
} from "@audio/testing/fakeAudioContext";
import { NODE_MODULES } from "./index";
import { bufferSourceNode } from "./bufferSource";
import { delayNode } from "./delay";

const services: AudioNodeServices = {
  getBuffer: () => FAKE_BUFFER,
  resolveMediaElement: () => null,
  resolveMediaStream: () => null,
};

describe("node modules", () => {
  it("should be registered under their own kind", () => {
    for (const [key, mod] of Object.entries(NODE_MODULES)) {
      expect(mod.kind).toBe(key);
    }
    expect(listNodeKinds()).toHaveLength(16);
  });

  it("should map every wire tag back to its kind", () => {
    for (const kind of listNodeKinds()) {
      expect(kindFromWireTag(getNodeModule(kind).wireTag)).toBe(kind);
    }
    expect(kindFromWireTag("Reverb")).toBeNull();
  });

  it("should only recognise registered kinds", () => {
    expect(isNodeKind("stereoPanner")).toBe(true);
    expect(isNodeKind("reverb")).toBe(false);
    expect(isNodeKind("toString")).toBe(false);
  });

  it("should tag decoded props with the kind", () => {
    expect(getNodeModule("delay").decode({ delayTime: 0.25, maxDelayTime: 2 })).toEqual({
      success: true,
      props: { kind: "delay", delayTime: 0.25, maxDelayTime: 2 },
    });
    expect(getNodeModule("channelMerger").decode({ numberOfInputs: 0 }).success).toBe(false);
  });

  describe("recreate rules", () => {
    it("should rebuild a delay only when its maximum changes", () => {
      expect(delayNode.shouldRecreate?.({ kind: "delay", maxDelayTime: 2 }, { kind: "delay", maxDelayTime: 1 })).toBe(
        true,
      );
      expect(delayNode.shouldRecreate?.({ kind: "delay", delayTime: 0.5 }, { kind: "delay", delayTime: 0.1 })).toBe(
        false,
      );
    });

    it("should rebuild a buffer source when its buffer or loop changes", () => {
      const base = { kind: "bufferSource", buffer: "kick.wav" } as const;
      expect(bufferSourceNode.shouldRecreate?.({ ...base, buffer: "snare.wav" }, base)).toBe(true);
      expect(bufferSourceNode.shouldRecreate?.({ ...base, loop: true }, base)).toBe(true);
      expect(bufferSourceNode.shouldRecreate?.({ ...base, playbackRate: 2 }, base)).toBe(false);
    });

    it("should list a buffer source's asset", () => {
      expect(bufferSourceNode.assets?.({ kind: "bufferSource", buffer: "kick.wav" })).toEqual(["kick.wav"]);
      expect(bufferSourceNode.assets?.({ kind: "bufferSource", buffer: "" })).toEqual([]);
    });
  });

  describe("audio factories", () => {
    it("should configure a panner", () => {
      const ctx = new FakeAudioContext();
      getNodeModule("panner").audioFactory.create(ctx, { kind: "panner", panningModel: "HRTF", positionX: 2 }, services);

      expect(ctx.created(FakePannerNode)[0]?.panningModel).toBe("HRTF");
      expect(ctx.log).toEqual(["create panner#1", "panner#1.positionX.cancelScheduledValues(0)", "panner#1.positionX.value = 2"]);
    });

    it("should set normalize before the convolver buffer", () => {
      const ctx = new FakeAudioContext();
      getNodeModule("convolver").audioFactory.create(
        ctx,
        { kind: "convolver", buffer: "hall.wav", normalize: false },
        services,
      );

      const node = ctx.created(FakeConvolverNode)[0];
      expect(node?.normalize).toBe(false);
      expect(node?.buffer).toBe(FAKE_BUFFER);
    });

    it("should copy a wave shaper curve", () => {
      const ctx = new FakeAudioContext();
      getNodeModule("waveShaper").audioFactory.create(ctx, { kind: "waveShaper", curve: [-1, 0, 1] }, services);

      const curve = ctx.created(FakeWaveShaperNode)[0]?.curve;
      expect(curve ? Array.from(curve) : null).toEqual([-1, 0, 1]);
    });

    it("should give a stream destination no output", () => {
      const ctx = new FakeAudioContext();
      const instance = getNodeModule("mediaStreamDestination").audioFactory.create(
        ctx,
        { kind: "mediaStreamDestination" },
        services,
      );

      expect(instance.output).toBeNull();
      expect(instance.input).not.toBeNull();
    });

    it("should fail when a media stream cannot be found", () => {
      const ctx = new FakeAudioContext();
      expect(() =>
        getNodeModule("mediaStreamSource").audioFactory.create(
          ctx,
          { kind: "mediaStreamSource", mediaStream: "mic" },
          services,
        ),
      ).toThrow("Media stream not found: mic");
    });
  });
});
