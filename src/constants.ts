export const DOWNLOAD_CHUNK_SIZE_BYTES = 1024 * 1024;
export const CONNECT_TIMEOUT_MS = 20_000;
export const DOWNLOAD_USER_AGENT = "avatar-acquire/1.0";
export const FALLBACK_FILENAME = "avatar.glb";
