import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { TransferUpdate } from "../src/progress.js";
import {
  downloadPath,
  findContent,
  uploadDirectory,
  uploadFile,
} from "../src/transfer.js";
import { MemoryGitHub, shaOf } from "./support/memoryGitHub.js";

const target = { owner: "acme", repo: "site" };
const bytes = (text: string) => new Uint8Array(Buffer.from(text, "utf8"));

describe("findContent", () => {
  it("resolves to null for missing paths", async () => {
    const api = new MemoryGitHub();
    await expect(findContent(api, target, "missing.txt")).resolves.toBeNull();
    await expect(findContent(api, { owner: "acme", repo: "other" }, "")).resolves.toBeNull();
  });

  it("propagates errors other than not found", async () => {
    const api = new MemoryGitHub();
    jest.spyOn(api, "getContents").mockRejectedValueOnce(new Error("boom"));
    await expect(findContent(api, target, "a.txt")).rejects.toThrow("boom");
  });
});

describe("uploadFile", () => {
  it("creates content at a new path", async () => {
    const api = new MemoryGitHub();

    const result = await uploadFile(api, target, {
      remotePath: "notes/today.txt",
      fileName: "today.txt",
      content: bytes("hello"),
    });

    expect(result).toEqual({ path: "notes/today.txt", outcome: "created" });
    expect(api.writes).toEqual([
      {
        method: "PUT",
        path: "notes/today.txt",
        message: "Add notes/today.txt",
        sha: undefined,
        branch: undefined,
      },
    ]);
    expect(api.text("notes/today.txt")).toBe("hello");
  });

  it("updates an existing path using the prior hash", async () => {
    const api = new MemoryGitHub().seed("today.txt", "old");
    const priorSha = shaOf(bytes("old"));

    const result = await uploadFile(
      api,
      target,
      { remotePath: "today.txt", fileName: "today.txt", content: bytes("new") },
      { branch: "dev" }
    );

    expect(result.outcome).toBe("updated");
    expect(api.writes[0]).toEqual({
      method: "PUT",
      path: "today.txt",
      message: "Update today.txt",
      sha: priorSha,
      branch: "dev",
    });
    expect(api.readRefs).toEqual(["dev"]);
    expect(api.text("today.txt")).toBe("new");
  });

  it("uses a custom commit message", async () => {
    const api = new MemoryGitHub();
    await uploadFile(
      api,
      target,
      { remotePath: "a.txt", fileName: "a.txt", content: bytes("a") },
      { message: "Publish notes" }
    );
    expect(api.writes[0].message).toBe("Publish notes");
  });

  it("places the file inside an existing directory", async () => {
    const api = new MemoryGitHub().seed("docs/index.md", "# Docs");

    const result = await uploadFile(api, target, {
      remotePath: "docs",
      fileName: "guide.md",
      content: bytes("guide"),
    });

    expect(result).toEqual({ path: "docs/guide.md", outcome: "created" });
    expect(api.text("docs/guide.md")).toBe("guide");
  });

  it("refuses a directory when no file name is given", async () => {
    const api = new MemoryGitHub().seed("docs/index.md", "# Docs");

    await expect(
      uploadFile(api, target, { remotePath: "docs", content: bytes("guide") })
    ).rejects.toThrow("Cannot overwrite directory: docs");
    expect(api.writes).toEqual([]);
  });

  it("refuses to overwrite a symlink", async () => {
    const api = new MemoryGitHub().seed("link", "target");
    api.symlinks.add("link");

    await expect(
      uploadFile(api, target, { remotePath: "link", fileName: "link", content: bytes("x") })
    ).rejects.toThrow("Cannot overwrite symlink: link");
    expect(api.writes).toEqual([]);
  });
});

describe("directory transfers", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "gitup-transfer-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("uploads every file below a directory in sorted order", async () => {
    const source = join(workDir, "site");
    await mkdir(join(source, "css"), { recursive: true });
    await writeFile(join(source, "index.html"), "<h1>hi</h1>");
    await writeFile(join(source, "css", "main.css"), "body {}");
    const api = new MemoryGitHub().seed("public/index.html", "old");
    const updates: TransferUpdate[] = [];

    const result = await uploadDirectory(api, target, source, "public", {
      onProgress: (update) => updates.push(update),
    });

    expect(result).toEqual({ created: 1, updated: 1, total: 2 });
    expect(api.writes.map((write) => write.message)).toEqual([
      "Add public/css/main.css",
      "Update public/index.html",
    ]);
    expect(updates).toEqual([
      { processed: 1, total: 2, path: "public/css/main.css", state: "created" },
      { processed: 2, total: 2, path: "public/index.html", state: "updated" },
    ]);
  });

  it("refuses to write a file where the remote has a directory", async () => {
    const source = join(workDir, "site");
    await mkdir(source, { recursive: true });
    await writeFile(join(source, "docs"), "plain file");
    const api = new MemoryGitHub().seed("public/docs/index.md", "# Docs");

    await expect(uploadDirectory(api, target, source, "public")).rejects.toThrow(
      "Failed to upload public/docs: Cannot overwrite directory: public/docs"
    );
    expect(api.writes).toEqual([]);
  });

  it("stops at the first failure and keeps what was uploaded", async () => {
    const source = join(workDir, "site");
    await mkdir(source, { recursive: true });
    await writeFile(join(source, "a.txt"), "a");
    await writeFile(join(source, "b.txt"), "b");
    await writeFile(join(source, "c.txt"), "c");
    const api = new MemoryGitHub();
    const putFile = api.putFile.bind(api);
    jest.spyOn(api, "putFile").mockImplementation(async (owner, repo, path, params) => {
      if (path === "b.txt") throw new Error("write refused");
      return putFile(owner, repo, path, params);
    });

    await expect(uploadDirectory(api, target, source, "")).rejects.toThrow(
      "Failed to upload b.txt: write refused"
    );
    expect([...api.files.keys()]).toEqual(["a.txt"]);
  });

  it("downloads a single file into the destination directory", async () => {
    const api = new MemoryGitHub().seed("docs/guide.md", "guide");
    const dest = join(workDir, "out");

    const result = await downloadPath(api, target, "docs/guide.md", dest);

    expect(result).toEqual({ kind: "file", name: "guide.md", localPath: join(dest, "guide.md") });
    await expect(readFile(join(dest, "guide.md"), "utf8")).resolves.toBe("guide");
  });

  it("downloads a directory tree file by file", async () => {
    const api = new MemoryGitHub()
      .seed("docs/index.md", "index")
      .seed("docs/img/logo.svg", "<svg/>")
      .seed("README.md", "readme");
    const dest = join(workDir, "out");
    const updates: TransferUpdate[] = [];

    const result = await downloadPath(api, target, "docs", dest, {
      onProgress: (update) => updates.push(update),
    });

    expect(result).toEqual({
      kind: "directory",
      files: [join(dest, "img", "logo.svg"), join(dest, "index.md")],
      skipped: [],
    });
    await expect(readFile(join(dest, "img", "logo.svg"), "utf8")).resolves.toBe("<svg/>");
    await expect(readFile(join(dest, "index.md"), "utf8")).resolves.toBe("index");
    expect(updates.map((update) => update.path)).toEqual(["docs/img/logo.svg", "docs/index.md"]);
  });

  it("skips symlinks inside a directory", async () => {
    const api = new MemoryGitHub().seed("docs/a.md", "a").seed("docs/link", "a.md");
    api.symlinks.add("docs/link");

    const result = await downloadPath(api, target, "docs", join(workDir, "out"));

    expect(result).toEqual({
      kind: "directory",
      files: [join(workDir, "out", "a.md")],
      skipped: ["docs/link"],
    });
  });

  it("falls back to the blob API for oversized files", async () => {
    const api = new MemoryGitHub().seed("data.csv", "a,b\n1,2\n");
    api.oversized.add("data.csv");
    const getBlob = jest.spyOn(api, "getBlob");

    await downloadPath(api, target, "data.csv", workDir);

    expect(getBlob).toHaveBeenCalledWith("acme", "site", shaOf(bytes("a,b\n1,2\n")));
    await expect(readFile(join(workDir, "data.csv"), "utf8")).resolves.toBe("a,b\n1,2\n");
  });
});
