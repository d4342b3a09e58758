/** errno codes the CLI and loaders turn into a short, stable reason */
const ERRNO_REASONS: Readonly<Record<string, string>> = {
  ENOENT: "file_not_found",
  EACCES: "permission_denied",
  EPERM: "operation_not_permitted",
  EISDIR: "is_a_directory",
  ENOTDIR: "not_a_directory",
};

export function reasonFromCode(code: string | undefined): string {
  if (code === undefined) return "unknown";
  return ERRNO_REASONS[code] ?? code.toLowerCase();
}

/** `code` of a Node system error, when the thrown value carries one */
export function extractErrorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
