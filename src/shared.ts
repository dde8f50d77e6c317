export type AvatarReasonCode =
  | "empty_url"
  | "network_error"
  | "filesystem_error"
  | "import_error";

export type AvatarError = {
  reasonCode: AvatarReasonCode;
  message: string;
  status?: number;
};

export type AvatarResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: AvatarError };

export function apiOk<T>(data: T): AvatarResult<T> {
  return { ok: true, data };
}

export function apiErr<T>(error: AvatarError): AvatarResult<T> {
  return { ok: false, error };
}

export function describeError(error: unknown, fallback: string): string {
  return error instanceof Error && error.message ? error.message : fallback;
}
