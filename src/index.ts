export {
  acquireAvatar,
  type AcquireAvatarOutcome,
  type AcquireAvatarSettings,
  type AvatarCollaborators,
  type AvatarImporter,
} from "./acquire.js";

export {
  computeProgressPercent,
  deriveFilename,
  downloadAvatarFile,
  formatProgressReport,
  parseContentLength,
  type AvatarDownloadOutcome,
  type AvatarDownloadRequestOptions,
  type DownloadProgress,
  type DownloadProgressCallback,
} from "./download.js";

export {
  AVATAR_POSES,
  DEFAULT_AVATAR_FORM,
  MORPH_TARGET_CHECKLIST,
  MORPH_TARGET_LABELS,
  avatarOptionsFromForm,
  buildAvatarRequestUrl,
  describeMorphTargets,
  type AvatarDownloadOptions,
  type AvatarFormState,
  type AvatarPose,
  type MorphTargetTag,
} from "./request.js";

export {
  T_POSE_RESET_JOINTS,
  normalizeToTPose,
  shouldNormalizePose,
  type PoseJoint,
  type RotationMode,
  type SkeletonHandle,
} from "./pose.js";

export { createThreeSkeletonHandle } from "./three-skeleton.js";

export { LogLevel, Logger, logger, parseLogLevel, type LogSink } from "./logger.js";

export type { AvatarError, AvatarReasonCode, AvatarResult } from "./shared.js";
