import { describe, it, expect, vi } from "vitest";
import type { FrameBuffer } from "@linework/contracts";
import { GifVideoSink } from "../../src/video/GifVideoSink";
import { VideoSinkError } from "../../src/errors";

function solid(width: number, height: number, rgb: [number, number, number]): FrameBuffer {
  const data = new Uint8ClampedArray(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data.set([rgb[0], rgb[1], rgb[2], 255], i);
  }
  return { width, height, data };
}

describe("GifVideoSink", () => {
  it("encodes frames into a GIF stream", () => {
    const sink = new GifVideoSink({ path: "out.gif" });
    const bytes = sink.encode([solid(4, 2, [255, 0, 0]), solid(4, 2, [0, 0, 255])], 25);

    expect(new TextDecoder().decode(bytes.slice(0, 6))).toBe("GIF89a");
    // Logical screen size, little endian
    expect(Array.from(bytes.slice(6, 10))).toEqual([4, 0, 2, 0]);
    expect(bytes[bytes.length - 1]).toBe(0x3b);
  });

  it("writes the encoded bytes to the configured path", async () => {
    const writeOutput = vi.fn(async (_path: string, _bytes: Uint8Array) => {});
    const sink = new GifVideoSink({ path: "dial.gif", maxColors: 16 }, writeOutput);
    await sink.write([solid(2, 2, [10, 20, 30])], 10);

    expect(writeOutput).toHaveBeenCalledTimes(1);
    const [path, bytes] = writeOutput.mock.calls[0];
    expect(path).toBe("dial.gif");
    expect(bytes[bytes.length - 1]).toBe(0x3b);
  });

  it("rejects empty and mixed-size sequences", async () => {
    const sink = new GifVideoSink({ path: "out.gif" }, vi.fn(async () => {}));
    await expect(sink.write([], 10)).rejects.toThrow("No frames to write");
    await expect(sink.write([solid(2, 2, [0, 0, 0]), solid(3, 2, [0, 0, 0])], 10)).rejects.toThrow(
      VideoSinkError
    );
  });

  it("rejects a frame rate of zero", () => {
    const sink = new GifVideoSink({ path: "out.gif" });
    expect(() => sink.encode([solid(1, 1, [0, 0, 0])], 0)).toThrow("Invalid frame rate 0");
  });
});
