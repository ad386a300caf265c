import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import http, { type IncomingHttpHeaders, type Server } from "node:http";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ServerConfig } from "../config/runtime";
import { silentLogger, type Logger } from "../logging";
import { startFileServer } from "./fileServer";

type HttpResult = {
  status: number;
  headers: IncomingHttpHeaders;
  body: Buffer;
};

const BINARY = Buffer.from(Array.from({ length: 70_000 }, (_, i) => i % 251));

function configFor(rootDir: string): ServerConfig {
  return {
    rootDir,
    host: "127.0.0.1",
    port: 0,
    locale: "en",
    timeouts: { readTimeoutMs: 5_000, writeTimeoutMs: 5_000 },
  };
}

function portOf(server: Server): number {
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server is not listening on a TCP port");
  }
  return address.port;
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

function request(port: number, path: string, method = "GET"): Promise<HttpResult> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      { host: "127.0.0.1", port, path, method, agent: false },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("error", reject);
        res.on("end", () =>
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            body: Buffer.concat(chunks),
          }),
        );
      },
    );
    req.on("error", reject);
    req.end();
  });
}

function listItems(body: Buffer): string[] {
  const lines = body.toString("utf8").split("\n");
  return lines.slice(lines.indexOf("<ul>") + 1, lines.indexOf("</ul>"));
}

describe("file server", () => {
  let baseDir: string;
  let rootDir: string;
  let server: Server;
  let port: number;

  beforeAll(async () => {
    baseDir = realpathSync(mkdtempSync(join(tmpdir(), "dirshare-test-")));
    rootDir = join(baseDir, "share");
    mkdirSync(join(rootDir, "docs", "nested"), { recursive: true });
    writeFileSync(join(rootDir, "hello.txt"), "hello world");
    writeFileSync(join(rootDir, "bin.dat"), BINARY);
    writeFileSync(join(rootDir, "<script>.txt"), "x");
    writeFileSync(join(rootDir, "my file.txt"), "spaced");
    writeFileSync(join(rootDir, "报告.pdf"), "pdf");
    writeFileSync(join(rootDir, "docs", "guide.md"), "# guide\n");
    writeFileSync(join(rootDir, "docs", "nested", "deep.txt"), "deep");
    writeFileSync(join(baseDir, "secret.txt"), "outside the share");

    server = await startFileServer(configFor(rootDir), { logger: silentLogger });
    port = portOf(server);
  });

  afterAll(async () => {
    await closeServer(server);
    rmSync(baseDir, { recursive: true, force: true });
  });

  describe("directory listing", () => {
    it("lists the root without a parent link", async () => {
      const res = await request(port, "/");

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toBe("text/html; charset=utf-8");
      expect(listItems(res.body)).toEqual([
        '<li><a href="/%3Cscript%3E.txt"><span class="file">&lt;script&gt;.txt</span></a></li>',
        '<li><a href="/bin.dat"><span class="file">bin.dat</span></a></li>',
        '<li><a href="/docs/"><span class="dir">docs</span></a></li>',
        '<li><a href="/hello.txt"><span class="file">hello.txt</span></a></li>',
        '<li><a href="/my%20file.txt"><span class="file">my file.txt</span></a></li>',
        '<li><a href="/%E6%8A%A5%E5%91%8A.pdf"><span class="file">报告.pdf</span></a></li>',
      ]);
    });

    it("lists immediate children of a subdirectory with one parent link", async () => {
      const expected = [
        '<li><a href="/">.. (Parent Directory)</a></li>',
        '<li><a href="/docs/guide.md"><span class="file">guide.md</span></a></li>',
        '<li><a href="/docs/nested/"><span class="dir">nested</span></a></li>',
      ];

      expect(listItems((await request(port, "/docs/")).body)).toEqual(expected);
      expect(listItems((await request(port, "/docs")).body)).toEqual(expected);
    });

    it("links nested listings back to their parent", async () => {
      const res = await request(port, "/docs/nested/");

      expect(listItems(res.body)).toEqual([
        '<li><a href="/docs">.. (Parent Directory)</a></li>',
        '<li><a href="/docs/nested/deep.txt"><span class="file">deep.txt</span></a></li>',
      ]);
    });
  });

  describe("file download", () => {
    it("sends attachment headers and the full body", async () => {
      const res = await request(port, "/hello.txt");

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toBe("application/octet-stream");
      expect(res.headers["content-length"]).toBe("11");
      expect(res.headers["content-disposition"]).toBe(
        "attachment; filename=\"hello.txt\"; filename*=UTF-8''hello.txt",
      );
      expect(res.body.toString("utf8")).toBe("hello world");
    });

    it("streams binary files byte for byte", async () => {
      const res = await request(port, "/bin.dat");

      expect(res.headers["content-length"]).toBe("70000");
      expect(res.body.equals(BINARY)).toBe(true);
    });

    it("encodes non-ASCII names in the extended filename", async () => {
      const res = await request(port, "/%E6%8A%A5%E5%91%8A.pdf");

      expect(res.headers["content-disposition"]).toBe(
        "attachment; filename=\"__.pdf\"; filename*=UTF-8''%E6%8A%A5%E5%91%8A.pdf",
      );
      expect(res.body.toString("utf8")).toBe("pdf");
    });

    it("answers HEAD with headers only", async () => {
      const res = await request(port, "/hello.txt", "HEAD");

      expect(res.status).toBe(200);
      expect(res.headers["content-length"]).toBe("11");
      expect(res.body.length).toBe(0);
    });

    it("serves concurrent downloads independently", async () => {
      const [binary, hello, spaced] = await Promise.all([
        request(port, "/bin.dat"),
        request(port, "/hello.txt"),
        request(port, "/my%20file.txt"),
      ]);

      expect(binary.body.equals(BINARY)).toBe(true);
      expect(hello.body.toString("utf8")).toBe("hello world");
      expect(spaced.body.toString("utf8")).toBe("spaced");
    });
  });

  describe("failures", () => {
    it("returns 404 for missing entries", async () => {
      const res = await request(port, "/missing.txt");

      expect(res.status).toBe(404);
      expect(res.headers["content-type"]).toBe("text/plain; charset=utf-8");
      expect(res.body.toString("utf8")).toBe("404 Not Found\n");
    });

    it.each(["/../secret.txt", "/..%2fsecret.txt", "/%2e%2e/%2e%2e/secret.txt", "/docs/../../secret.txt"])(
      "keeps %s inside the shared directory",
      async (path) => {
        const res = await request(port, path);

        expect(res.status).toBe(404);
        expect(res.body.toString("utf8")).toBe("404 Not Found\n");
      },
    );

    it("resolves dot segments that stay inside the root", async () => {
      const res = await request(port, "/docs/../hello.txt");

      expect(res.status).toBe(200);
      expect(res.body.toString("utf8")).toBe("hello world");
    });

    it("returns 400 for undecodable paths", async () => {
      const res = await request(port, "/%E0%A4%A");

      expect(res.status).toBe(400);
      expect(res.body.toString("utf8")).toBe("400 Bad Request\n");
    });

    it("returns 405 for methods other than GET and HEAD", async () => {
      const res = await request(port, "/hello.txt", "POST");

      expect(res.status).toBe(405);
      expect(res.headers.allow).toBe("GET, HEAD");
    });
  });
});

describe("names with backslashes", () => {
  it.skipIf(process.platform === "win32")("links to the file itself", async () => {
    const baseDir = realpathSync(mkdtempSync(join(tmpdir(), "dirshare-backslash-")));
    writeFileSync(join(baseDir, "a\\b.txt"), "backslash");
    mkdirSync(join(baseDir, "a"));
    writeFileSync(join(baseDir, "a", "b.txt"), "nested");
    const server = await startFileServer(configFor(baseDir), { logger: silentLogger });

    try {
      const port = portOf(server);
      expect(listItems((await request(port, "/")).body)).toEqual([
        '<li><a href="/a/"><span class="dir">a</span></a></li>',
        '<li><a href="/a%5Cb.txt"><span class="file">a\\b.txt</span></a></li>',
      ]);

      const res = await request(port, "/a%5Cb.txt");
      expect(res.status).toBe(200);
      expect(res.body.toString("utf8")).toBe("backslash");
    } finally {
      await closeServer(server);
      rmSync(baseDir, { recursive: true, force: true });
    }
  });
});

describe("request log", () => {
  it("logs the start and completion of every request", async () => {
    const baseDir = realpathSync(mkdtempSync(join(tmpdir(), "dirshare-log-")));
    writeFileSync(join(baseDir, "a.txt"), "a");
    const info = vi.fn<(message: string) => void>();
    const logger: Logger = { info, warn: vi.fn(), error: vi.fn() };
    const server = await startFileServer(configFor(baseDir), { logger });

    try {
      await request(portOf(server), "/a.txt");
      await request(portOf(server), "/nope.txt");

      await vi.waitFor(() => {
        const lines = info.mock.calls.map(([message]) => message);
        expect(lines).toContain("[REQUEST] GET /a.txt");
        expect(lines.some((line) => /^\[COMPLETE\] GET \/a\.txt 200 Duration: \d+\.\dms$/.test(line))).toBe(true);
        expect(lines.some((line) => /^\[COMPLETE\] GET \/nope\.txt 404 Duration: \d+\.\dms$/.test(line))).toBe(true);
      });
    } finally {
      await closeServer(server);
      rmSync(baseDir, { recursive: true, force: true });
    }
  });
});
