import os from "node:os";

import { acquireAvatar, formatProgressReport } from "../src/index.js";

const liveMode = process.env.AVATAR_EXAMPLE_LIVE === "1";
const modelUrl = process.env.AVATAR_MODEL_URL ?? "";

if (!liveMode) {
  const dryRun = await acquireAvatar({ url: modelUrl }, { importer: { importModel: () => null } });
  console.log("dry-run outcome:", dryRun.ok ? dryRun.state : dryRun.reasonCode);
  process.exit(0);
}

const result = await acquireAvatar(
  { url: modelUrl, pose: process.env.AVATAR_POSE ?? "T", morphTargets: ["ARKit"] },
  {
    importer: {
      importModel(filePath) {
        console.log("ready for import:", filePath);
        return null;
      },
    },
  },
  {
    destinationDir: process.env.AVATAR_DOWNLOAD_DIR ?? os.tmpdir(),
    onProgress: (progress) => console.log(formatProgressReport(progress)),
  },
);

if (!result.ok) {
  console.error("acquire failed:", result.reasonCode, result.message);
  process.exit(1);
}

console.log("downloaded:", {
  requestUrl: result.requestUrl,
  filePath: result.filePath,
  poseNormalized: result.poseNormalized,
});
