export function encodeUrlPath(relativePath: string): string {
  const encoded = relativePath
    .split("/")
    .filter((segment) => segment.length > 0)
    .map((segment) => encodeURIComponent(segment))
    .join("/");
  return `/${encoded}`;
}

export function parentUrlPath(relativePath: string): string {
  const segments = relativePath.split("/").filter((segment) => segment.length > 0);
  return encodeUrlPath(segments.slice(0, -1).join("/"));
}

// RFC 5987 value for the filename* parameter.
export function encodeRfc5987(value: string): string {
  return encodeURIComponent(value).replace(
    /['()*]/gu,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}
