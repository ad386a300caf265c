import path from "node:path";

export type PathRejection = "malformed" | "outside-root";

export type ResolvedPath =
  | Readonly<{ ok: true; relativePath: string; absolutePath: string }>
  | Readonly<{ ok: false; reason: PathRejection }>;

/**
 * Decodes a raw request path and normalises it against a virtual `/`, so `..`
 * segments collapse at the root boundary. Returns the relative path without
 * leading or trailing slashes (`""` for the root), or `null` when the path
 * cannot be decoded or carries a NUL byte.
 */
export function cleanRelativePath(rawUrlPath: string): string | null {
  let decoded: string;
  try {
    decoded = decodeURIComponent(rawUrlPath);
  } catch {
    return null;
  }
  if (decoded.includes("\0")) return null;

  return path.posix.normalize(`/${decoded}`).replace(/^\/+|\/+$/gu, "");
}

export function isWithinRoot(rootDir: string, candidate: string): boolean {
  const relative = path.relative(rootDir, candidate);
  if (relative === "") return true;
  if (path.isAbsolute(relative)) return false;
  return relative !== ".." && !relative.startsWith(`..${path.sep}`);
}

export function resolveRequestPath(rootDir: string, rawUrlPath: string): ResolvedPath {
  const relativePath = cleanRelativePath(rawUrlPath);
  if (relativePath === null) return { ok: false, reason: "malformed" };

  const absolutePath = path.join(rootDir, relativePath);
  if (!isWithinRoot(rootDir, absolutePath)) {
    return { ok: false, reason: "outside-root" };
  }

  return { ok: true, relativePath, absolutePath };
}
