import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { acquireAvatar, type AvatarImporter } from "./acquire.js";
import { LogLevel, Logger } from "./logger.js";
import type { PoseJoint, SkeletonHandle } from "./pose.js";

const MiB = 1024 * 1024;

function chunkedResponse(totalBytes: number, pieceBytes: number) {
  let sent = 0;
  const body = new ReadableStream<Uint8Array>({
    pull(controller) {
      if (sent >= totalBytes) {
        controller.close();
        return;
      }
      const size = Math.min(pieceBytes, totalBytes - sent);
      controller.enqueue(new Uint8Array(size).fill(7));
      sent += size;
    },
  });
  return new Response(body, {
    status: 200,
    headers: { "content-type": "model/gltf-binary", "content-length": String(totalBytes) },
  });
}

function recordingSkeleton() {
  const rotations = new Map<string, number[]>();
  const findJoint = vi.fn((name: string): PoseJoint | null => {
    if (name !== "LeftArm" && name !== "RightArm") return null;
    return {
      setRotationMode() {},
      setEulerRotation(x, y, z) {
        rotations.set(name, [x, y, z]);
      },
    };
  });
  const skeleton: SkeletonHandle = { findJoint };
  return { skeleton, findJoint, rotations };
}

function quietLogger() {
  const sink = { error: vi.fn(), warn: vi.fn(), log: vi.fn() };
  return { logger: new Logger(LogLevel.DEBUG, sink), sink };
}

describe("acquireAvatar", () => {
  let destinationDir = "";

  beforeEach(async () => {
    destinationDir = await mkdtemp(path.join(os.tmpdir(), "avatar-acquire-"));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(destinationDir, { recursive: true, force: true });
  });

  it("downloads an A-pose avatar, imports it and skips pose normalization", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(chunkedResponse(10 * MiB, MiB));
    vi.stubGlobal("fetch", fetchMock);
    const { skeleton, findJoint } = recordingSkeleton();
    const importModel = vi.fn<AvatarImporter["importModel"]>().mockResolvedValue(skeleton);
    const { logger, sink } = quietLogger();
    const percents: Array<number | null> = [];

    const result = await acquireAvatar(
      { url: "https://cdn.example/avatars/a1.glb", pose: "A", morphTargets: [] },
      { importer: { importModel }, logger },
      { destinationDir, onProgress: (progress) => percents.push(progress.percent) },
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.requestUrl).toBe("https://cdn.example/avatars/a1.glb?pose=A");
    expect(String(fetchMock.mock.calls[0][0])).toBe("https://cdn.example/avatars/a1.glb?pose=A");
    expect(percents).toEqual([10, 20, 30, 40, 50, 60, 70, 80, 90, 100]);
    expect(result.filePath.endsWith("a1.glb")).toBe(true);
    expect(result.filePath).toBe(path.join(destinationDir, "a1.glb"));
    expect(importModel).toHaveBeenCalledWith(result.filePath);
    expect(result.poseNormalized).toBe(false);
    expect(result.jointsReset).toBe(0);
    expect(findJoint).not.toHaveBeenCalled();

    const infoLines = sink.log.mock.calls.map((call) => String(call[0]));
    expect(infoLines.some((line) => line.endsWith("INFO: Starting download of a1.glb"))).toBe(true);
    expect(infoLines.some((line) => line.endsWith(`INFO: Model downloaded to ${result.filePath}`))).toBe(true);
    expect(infoLines.filter((line) => line.includes("DEBUG: Downloaded "))).toHaveLength(10);
  });

  it("normalizes the imported skeleton for T-pose requests", async () => {
    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockResolvedValue(chunkedResponse(3 * MiB, MiB)));
    const { skeleton, rotations } = recordingSkeleton();
    const { logger } = quietLogger();

    const result = await acquireAvatar(
      { url: "https://cdn.example/avatars/t1.glb", pose: "t", morphTargets: ["ARKit", "mouthSmile"] },
      { importer: { importModel: () => skeleton }, logger },
      { destinationDir },
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.requestUrl).toBe("https://cdn.example/avatars/t1.glb?morphTargets=ARKit%2CmouthSmile&pose=T");
    expect(result.filePath).toBe(path.join(destinationDir, "t1.glb"));
    expect(result.poseNormalized).toBe(true);
    expect(result.jointsReset).toBe(2);
    expect(rotations.get("LeftArm")).toEqual([0, 0, 0]);
    expect(rotations.get("RightArm")).toEqual([0, 0, 0]);
  });

  it("treats a missing armature as nothing to normalize", async () => {
    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockResolvedValue(chunkedResponse(1024, 512)));
    const { logger } = quietLogger();

    const result = await acquireAvatar(
      { url: "https://cdn.example/avatars/prop.glb", pose: "T" },
      { importer: { importModel: async () => null }, logger },
      { destinationDir },
    );

    expect(result).toMatchObject({ ok: true, poseNormalized: true, jointsReset: 0 });
  });

  it("fails on a blank URL before touching the network", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", fetchMock);
    const importModel = vi.fn<AvatarImporter["importModel"]>();
    const { logger, sink } = quietLogger();

    const result = await acquireAvatar({ url: "   ", pose: "T" }, { importer: { importModel }, logger }, { destinationDir });

    expect(result).toEqual({
      ok: false,
      state: "failed",
      reasonCode: "empty_url",
      message: "URL is empty. Please enter a valid URL.",
    });
    expect(fetchMock).not.toHaveBeenCalled();
    expect(importModel).not.toHaveBeenCalled();
    expect(sink.error).toHaveBeenCalledTimes(1);
  });

  it("does not import when the download fails", async () => {
    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockResolvedValue(new Response("oops", { status: 500 })));
    const importModel = vi.fn<AvatarImporter["importModel"]>();
    const { logger } = quietLogger();

    const result = await acquireAvatar(
      { url: "https://cdn.example/avatars/a1.glb", pose: "A" },
      { importer: { importModel }, logger },
      { destinationDir },
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.reasonCode).toBe("network_error");
    expect(result.status).toBe(500);
    expect(result.requestUrl).toBe("https://cdn.example/avatars/a1.glb?pose=A");
    expect(importModel).not.toHaveBeenCalled();
  });

  it("surfaces the importer's error as an import failure", async () => {
    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockResolvedValue(chunkedResponse(2048, 1024)));
    const { logger } = quietLogger();

    const result = await acquireAvatar(
      { url: "https://cdn.example/avatars/a1.glb", pose: "T" },
      {
        importer: {
          importModel: async () => {
            throw new Error("corrupt glb header");
          },
        },
        logger,
      },
      { destinationDir },
    );

    expect(result).toEqual({
      ok: false,
      state: "failed",
      reasonCode: "import_error",
      message: "Failed to import a1.glb: corrupt glb header",
      requestUrl: "https://cdn.example/avatars/a1.glb?pose=T",
      filePath: path.join(destinationDir, "a1.glb"),
    });
  });

  it("reports a failing joint update as a warning instead of rejecting", async () => {
    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockResolvedValue(chunkedResponse(1024, 1024)));
    const { logger, sink } = quietLogger();
    const skeleton: SkeletonHandle = {
      findJoint: () => ({
        setRotationMode() {},
        setEulerRotation() {
          throw new Error("bone is locked");
        },
      }),
    };

    const result = await acquireAvatar(
      { url: "https://cdn.example/avatars/locked.glb", pose: "T" },
      { importer: { importModel: () => skeleton }, logger },
      { destinationDir },
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.poseNormalized).toBe(true);
    expect(result.jointsReset).toBe(0);
    expect(result.warnings).toEqual(["Pose normalization failed: bone is locked"]);
    expect(String(sink.warn.mock.calls[0][0])).toMatch(/WARN: Pose normalization failed: bone is locked$/);
  });
});
