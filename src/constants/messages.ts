export const LOCALES = ["en", "zh"] as const;
export type Locale = (typeof LOCALES)[number];

export type ListingMessages = Readonly<{
  title: string;
  heading: string;
  parentDirectory: string;
}>;

export const LISTING_MESSAGES: Readonly<Record<Locale, ListingMessages>> = {
  en: {
    title: "File Server",
    heading: "Directory Listing",
    parentDirectory: ".. (Parent Directory)",
  },
  zh: {
    title: "文件服务",
    heading: "目录列表",
    parentDirectory: ".. (上级目录)",
  },
};

export const STARTUP_MESSAGES = {
  promptRootDir: "Enter directory path to share (e.g. /sdcard or C:\\): ",
  invalidRootDir: "Invalid path, please retry",
  promptClosed: "Input closed before a directory to share was entered",
  promptExhausted: "No valid directory entered",
  exitHint: "Press CTRL+C to exit",
  bindFailed:
    "Server startup failed (possible causes: port in use or permission denied)",
} as const;

export const USAGE = [
  "Usage: dirshare [options]",
  "",
  "Options:",
  "  --dir, --directory <path>  Directory to share (asked interactively when omitted)",
  "  --port <number>            HTTP server port (default: 8080)",
  "  --host <address>           Address to bind (default: 0.0.0.0)",
  "  --lang <en|zh>             Listing page language (default: en)",
  "  -h, --help                 Show this help",
  "",
  "Environment: FILE_DIR, FILE_PORT, FILE_HOST, FILE_LANG,",
  "             FILE_READ_TIMEOUT_MS, FILE_WRITE_TIMEOUT_MS",
].join("\n");
