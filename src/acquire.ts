import path from "node:path";

import {
  deriveFilename,
  downloadAvatarFile,
  formatProgressReport,
  type AvatarDownloadRequestOptions,
  type DownloadProgressCallback,
} from "./download.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import { normalizeToTPose, shouldNormalizePose, type SkeletonHandle } from "./pose.js";
import { buildAvatarRequestUrl, describeMorphTargets, type AvatarDownloadOptions } from "./request.js";
import { describeError, type AvatarReasonCode } from "./shared.js";

/** Host-side model import; resolves with the imported armature, or `null` when there is none. */
export type AvatarImporter = {
  importModel(filePath: string): Promise<SkeletonHandle | null> | SkeletonHandle | null;
};

export type AvatarCollaborators = {
  importer: AvatarImporter;
  logger?: Logger;
};

export type AcquireAvatarSettings = {
  /** Where the model is written. Defaults to the working directory. */
  destinationDir?: string;
  onProgress?: DownloadProgressCallback;
  download?: AvatarDownloadRequestOptions;
};

export type AcquireAvatarOutcome =
  | {
      ok: true;
      state: "imported";
      requestUrl: string;
      filePath: string;
      poseNormalized: boolean;
      jointsReset: number;
      warnings: string[];
    }
  | {
      ok: false;
      state: "failed";
      reasonCode: AvatarReasonCode;
      message: string;
      status?: number;
      requestUrl?: string;
      filePath?: string;
    };

/**
 * Downloads the avatar selected by `options`, hands it to the host importer and, for a T-pose
 * request, zeroes the upper-arm joints of the imported skeleton.
 */
export async function acquireAvatar(
  options: AvatarDownloadOptions,
  collaborators: AvatarCollaborators,
  settings?: AcquireAvatarSettings,
): Promise<AcquireAvatarOutcome> {
  const log = collaborators.logger ?? defaultLogger;

  const built = buildAvatarRequestUrl(options);
  if (!built.ok) {
    log.error(built.error.message);
    return { ok: false, state: "failed", reasonCode: built.error.reasonCode, message: built.error.message };
  }

  const requestUrl = built.data;
  const filename = deriveFilename(requestUrl);
  const destinationDir = path.resolve(settings?.destinationDir ?? process.cwd());

  log.info(`Starting download of ${filename}`);
  const morphTargets = describeMorphTargets(options.morphTargets);
  if (morphTargets.length > 0) log.debug(`Morph targets: ${morphTargets.join(", ")}`);
  const downloaded = await downloadAvatarFile(
    requestUrl,
    destinationDir,
    (progress) => {
      log.debug(formatProgressReport(progress));
      settings?.onProgress?.(progress);
    },
    settings?.download,
  );

  if (!downloaded.ok) {
    log.error(`Failed to download ${filename}: ${downloaded.message}`);
    return { ...downloaded, requestUrl };
  }

  const { filePath } = downloaded;
  log.info(`Model downloaded to ${filePath}`);
  for (const warning of downloaded.warnings) log.warn(warning);

  let skeleton: SkeletonHandle | null;
  try {
    skeleton = await collaborators.importer.importModel(filePath);
  } catch (error) {
    const message = `Failed to import ${filename}: ${describeError(error, "import failed")}`;
    log.error(message);
    return { ok: false, state: "failed", reasonCode: "import_error", message, requestUrl, filePath };
  }

  const warnings = [...downloaded.warnings];
  const poseNormalized = shouldNormalizePose(options.pose);
  let jointsReset = 0;
  if (poseNormalized) {
    try {
      jointsReset = normalizeToTPose(skeleton);
      log.debug(`Reset ${jointsReset} joint(s) towards T-pose`);
    } catch (error) {
      const warning = `Pose normalization failed: ${describeError(error, "joint update failed")}`;
      log.warn(warning);
      warnings.push(warning);
    }
  }

  return {
    ok: true,
    state: "imported",
    requestUrl,
    filePath,
    poseNormalized,
    jointsReset,
    warnings,
  };
}
