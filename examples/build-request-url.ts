import {
  DEFAULT_AVATAR_FORM,
  avatarOptionsFromForm,
  buildAvatarRequestUrl,
  describeMorphTargets,
} from "../src/index.js";

const form = {
  ...DEFAULT_AVATAR_FORM,
  url: process.env.AVATAR_MODEL_URL ?? "https://models.example/avatars/demo.glb",
  pose: process.env.AVATAR_POSE === "A" ? ("A" as const) : ("T" as const),
  arkit: process.env.AVATAR_ARKIT === "1",
  oculusVisemes: process.env.AVATAR_OCULUS_VISEMES === "1",
};

const options = avatarOptionsFromForm(form);
const result = buildAvatarRequestUrl(options);
if (!result.ok) {
  console.error("build failed:", result.error.reasonCode, result.error.message);
  process.exit(1);
}

console.log("request url:", result.data);
console.log("morph targets:", describeMorphTargets(options.morphTargets).join(", ") || "(none)");
