import { apiErr, apiOk, type AvatarResult } from "./shared.js";

export const AVATAR_POSES = ["T", "A"] as const;
export type AvatarPose = (typeof AVATAR_POSES)[number];

// Serialization order is fixed by this list, never by selection order.
export const MORPH_TARGET_CHECKLIST = ["ARKit", "OculusVisemes", "mouthSmile", "mouthOpen"] as const;
export type MorphTargetTag = (typeof MORPH_TARGET_CHECKLIST)[number];

export const MORPH_TARGET_LABELS: Record<MorphTargetTag, string> = {
  ARKit: "ARKit",
  OculusVisemes: "Oculus Visemes",
  mouthSmile: "mouthSmile",
  mouthOpen: "mouthOpen",
};

export type AvatarDownloadOptions = {
  url: string;
  pose?: string | null;
  morphTargets?: Iterable<MorphTargetTag>;
};

/** Mirror of the host panel: a URL field, a pose dropdown and one checkbox per morph target. */
export type AvatarFormState = {
  url: string;
  pose: AvatarPose;
  arkit: boolean;
  oculusVisemes: boolean;
  mouthSmile: boolean;
  mouthOpen: boolean;
};

export const DEFAULT_AVATAR_FORM: Readonly<AvatarFormState> = {
  url: "",
  pose: "T",
  arkit: false,
  oculusVisemes: false,
  mouthSmile: false,
  mouthOpen: false,
};

export function avatarOptionsFromForm(form: AvatarFormState): AvatarDownloadOptions {
  const toggles: Record<MorphTargetTag, boolean> = {
    ARKit: form.arkit,
    OculusVisemes: form.oculusVisemes,
    mouthSmile: form.mouthSmile,
    mouthOpen: form.mouthOpen,
  };
  return {
    url: form.url,
    pose: form.pose,
    morphTargets: MORPH_TARGET_CHECKLIST.filter((tag) => toggles[tag]),
  };
}

export function normalizePose(pose: string | null | undefined): string {
  return (pose ?? "").trim().toUpperCase();
}

function orderedMorphTargets(tags: Iterable<MorphTargetTag> | undefined): MorphTargetTag[] {
  if (!tags) return [];
  const selected = new Set(tags);
  return MORPH_TARGET_CHECKLIST.filter((tag) => selected.has(tag));
}

/** Display labels of the selected morph targets, in checklist order. */
export function describeMorphTargets(tags: Iterable<MorphTargetTag> | undefined): string[] {
  return orderedMorphTargets(tags).map((tag) => MORPH_TARGET_LABELS[tag]);
}

/**
 * Builds the model request URL from the base URL and the selected options.
 *
 * The query is always joined with `?`, so a request without options ends in a bare `?`.
 */
export function buildAvatarRequestUrl(options: AvatarDownloadOptions): AvatarResult<string> {
  const baseUrl = options.url.trim();
  if (!baseUrl) {
    return apiErr({
      reasonCode: "empty_url",
      message: "URL is empty. Please enter a valid URL.",
    });
  }

  const query = new URLSearchParams();
  const morphTargets = orderedMorphTargets(options.morphTargets).join(",");
  if (morphTargets) query.set("morphTargets", morphTargets);
  const pose = normalizePose(options.pose);
  if (pose) query.set("pose", pose);

  return apiOk(`${baseUrl}?${query.toString()}`);
}
