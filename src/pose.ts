import { normalizePose } from "./request.js";

export type RotationMode = "XYZ";

/** A single posable joint of an imported skeleton. */
export type PoseJoint = {
  setRotationMode(mode: RotationMode): void;
  setEulerRotation(x: number, y: number, z: number): void;
};

/**
 * Minimal view of an imported armature. Hosts without a separate pose-editing mode leave the
 * mode hooks out.
 */
export type SkeletonHandle = {
  findJoint(name: string): PoseJoint | null;
  enterPoseMode?(): void;
  exitPoseMode?(): void;
};

// Upper-arm joints of the avatar rig; zeroing them lifts the arms out of the A-pose.
export const T_POSE_RESET_JOINTS = ["LeftArm", "RightArm"] as const;

export function shouldNormalizePose(pose: string | null | undefined): boolean {
  return normalizePose(pose) === "T";
}

/**
 * Zeroes the rotation of each fixed upper-arm joint present on `skeleton`.
 *
 * Returns how many joints were reset. A missing skeleton or joint is skipped, not reported.
 */
export function normalizeToTPose(skeleton: SkeletonHandle | null | undefined): number {
  if (!skeleton) return 0;

  let reset = 0;
  skeleton.enterPoseMode?.();
  try {
    for (const name of T_POSE_RESET_JOINTS) {
      const joint = skeleton.findJoint(name);
      if (!joint) continue;
      joint.setRotationMode("XYZ");
      joint.setEulerRotation(0, 0, 0);
      reset += 1;
    }
  } finally {
    skeleton.exitPoseMode?.();
  }
  return reset;
}
