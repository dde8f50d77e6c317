import { Bone, type Object3D } from "three";

import type { PoseJoint, SkeletonHandle } from "./pose.js";

function collectBones(root: Object3D): Bone[] {
  const bones: Bone[] = [];
  root.traverse((node) => {
    if (node instanceof Bone) bones.push(node);
  });
  return bones;
}

function boneJoint(bone: Bone): PoseJoint {
  return {
    setRotationMode(mode) {
      bone.rotation.order = mode;
    },
    setEulerRotation(x, y, z) {
      // Euler.set keeps the bone quaternion in sync.
      bone.rotation.set(x, y, z);
    },
  };
}

/**
 * Wraps a loaded glTF scene so the pose normalizer can edit its bones.
 *
 * Returns `null` when the scene carries no bones, i.e. the import produced no armature.
 */
export function createThreeSkeletonHandle(root: Object3D): SkeletonHandle | null {
  const bones = collectBones(root);
  if (bones.length === 0) return null;

  return {
    findJoint(name) {
      const bone = bones.find((candidate) => candidate.name === name);
      return bone ? boneJoint(bone) : null;
    },
    exitPoseMode() {
      root.updateMatrixWorld(true);
    },
  };
}
