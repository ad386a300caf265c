import type { Dirent } from "node:fs";
import type { ListingMessages } from "../constants/messages";
import { escapeHtml } from "../utils/html";
import { encodeUrlPath, parentUrlPath } from "../utils/urlPath";

export type ListingEntry = Readonly<{
  displayName: string;
  url: string;
  isDirectory: boolean;
}>;

/** Every string in here is already escaped for the spot it is rendered into. */
export type ListingView = Readonly<{
  relativePath: string;
  parentUrl?: string;
  entries: readonly ListingEntry[];
}>;

export type DirectoryChild = Pick<Dirent, "name" | "isDirectory">;

// UTF-8 byte order, which differs from UTF-16 order around astral characters.
function compareNames(a: DirectoryChild, b: DirectoryChild): number {
  return Buffer.compare(Buffer.from(a.name, "utf8"), Buffer.from(b.name, "utf8"));
}

export function buildListingView(
  relativePath: string,
  children: readonly DirectoryChild[],
): ListingView {
  const entries = [...children].sort(compareNames).map((child): ListingEntry => {
    const isDirectory = child.isDirectory();
    const childPath = relativePath ? `${relativePath}/${child.name}` : child.name;
    return {
      displayName: escapeHtml(child.name),
      url: isDirectory ? `${encodeUrlPath(childPath)}/` : encodeUrlPath(childPath),
      isDirectory,
    };
  });

  return {
    relativePath: escapeHtml(relativePath),
    parentUrl: relativePath ? parentUrlPath(relativePath) : undefined,
    entries,
  };
}

function renderEntry(entry: ListingEntry): string {
  const kind = entry.isDirectory ? "dir" : "file";
  return `<li><a href="${entry.url}"><span class="${kind}">${entry.displayName}</span></a></li>`;
}

export function renderListingPage(view: ListingView, messages: ListingMessages): string {
  const location = `/${view.relativePath}`;
  const items = view.entries.map(renderEntry);
  if (view.parentUrl !== undefined) {
    items.unshift(`<li><a href="${view.parentUrl}">${escapeHtml(messages.parentDirectory)}</a></li>`);
  }

  return [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    '<meta charset="UTF-8">',
    `<title>${escapeHtml(messages.title)} - ${location}</title>`,
    "<style>",
    "  li { font-family: monospace; }",
    "  .dir { color: blue; }",
    "  .file { color: green; }",
    "</style>",
    "</head>",
    "<body>",
    `<h1>${escapeHtml(messages.heading)}: ${location}</h1>`,
    "<ul>",
    ...items,
    "</ul>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
}
