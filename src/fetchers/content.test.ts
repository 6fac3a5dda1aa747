import { describe, test, expect } from "vitest";
import { RepoContentFetcher } from "./content";
import { ExtractionError, HttpError, ParseError } from "#/core";
import { defaultConfig, type GitHubSettings, type GitLabSettings } from "#/config";
import {
  binaryResponse,
  createMockFileSystem,
  createMockHttpClient,
  createMockLogger,
  errorResponse,
  makeZipball,
} from "#/test-utils/mocks";

const GITLAB = "https://gitlab.com/api/v4";
const GITHUB = "https://api.github.com";

function setup(
  responses: Record<string, Response>,
  overrides: { gitlab?: Partial<GitLabSettings>; github?: Partial<GitHubSettings> } = {}
) {
  const config = defaultConfig();
  const fs = createMockFileSystem();
  const http = createMockHttpClient(new Map(Object.entries(responses)));
  const logger = createMockLogger();
  const fetcher = new RepoContentFetcher(
    { ...config.gitlab, ...overrides.gitlab },
    { ...config.github, ...overrides.github },
    http,
    fs,
    logger
  );
  return { fs, http, logger, fetcher };
}

function tempFilesLeft(files: Map<string, unknown>): string[] {
  return [...files.keys()].filter((path) => path.includes("artifetch-"));
}

describe("RepoContentFetcher", () => {
  describe("GitLab", () => {
    test("fetches a whole repository without the archive's top folder", async () => {
      const { fetcher, fs } = setup({
        [`${GITLAB}/projects/group%2Frepo/repository/archive.zip?sha=HEAD`]: binaryResponse(
          makeZipball("repo-HEAD-abc123", { "README.md": "gldoc", "lib/a.py": "print(1)" })
        ),
      });

      const result = await fetcher.fetch("gitlab://group/repo", "/out");

      expect(result).toBe("/out");
      expect(fs.readText("/out/README.md")).toBe("gldoc");
      expect(fs.readText("/out/lib/a.py")).toBe("print(1)");
      expect(tempFilesLeft(fs.files)).toEqual([]);
    });

    test("fetches a directory flattened into dest", async () => {
      const { fetcher, fs, http } = setup({
        [`${GITLAB}/projects/group%2Fsub%2Frepo/repository/archive.zip?sha=main&path=services%2Fauth`]:
          binaryResponse(makeZipball("repo-main-abc", { "services/auth/a.txt": "A", "services/auth/k/b.txt": "B" })),
      });

      const result = await fetcher.fetch("gitlab://group/sub/repo@main//services/auth", "/out", { kind: "dir" });

      expect(result).toBe("/out");
      expect(fs.readText("/out/a.txt")).toBe("A");
      expect(fs.readText("/out/k/b.txt")).toBe("B");
      expect(fs.exists("/out/services")).toBe(false);
      expect(http.calls).toHaveLength(1);
    });

    test("fetches a single file", async () => {
      const { fetcher, fs } = setup({
        [`${GITLAB}/projects/group%2Fsub%2Frepo/repository/files/CHANGELOG.md/raw?ref=v1.2.3`]:
          binaryResponse("# Changes"),
      });

      const result = await fetcher.fetch("gitlab://group/sub/repo@v1.2.3//CHANGELOG.md", "/out");

      expect(result).toBe("/out/CHANGELOG.md");
      expect(fs.readText("/out/CHANGELOG.md")).toBe("# Changes");
    });

    test("writes a nested file under its basename", async () => {
      const { fetcher, fs } = setup({
        [`${GITLAB}/projects/group%2Frepo/repository/files/docs%2Fguide.md/raw?ref=HEAD`]: binaryResponse("guide"),
      });

      const result = await fetcher.fetch("gitlab://group/repo//docs/guide.md", "/out");

      expect(result).toBe("/out/guide.md");
      expect(fs.readText("/out/guide.md")).toBe("guide");
    });

    test("sends the token as PRIVATE-TOKEN", async () => {
      const { fetcher, http } = setup(
        { [`${GITLAB}/projects/group%2Frepo/repository/files/a.txt/raw?ref=HEAD`]: binaryResponse("a") },
        { gitlab: { token: "test-secret" } }
      );

      await fetcher.fetch("gitlab://group/repo//a.txt", "/out");

      expect(http.calls[0]?.headers).toEqual({ "user-agent": "artifetch", "private-token": "test-secret" });
    });

    test("uses the API base derived from a web URL", async () => {
      const { fetcher, http } = setup({
        "https://gitlab.example.com/api/v4/projects/group%2Frepo/repository/files/docs%2Fguide.md/raw?ref=v2":
          binaryResponse("guide"),
      });

      const result = await fetcher.fetch("gitlab://https://gitlab.example.com/group/repo/-/blob/v2/docs/guide.md", "/out");

      expect(result).toBe("/out/guide.md");
      expect(http.calls[0]?.url).toBe(
        "https://gitlab.example.com/api/v4/projects/group%2Frepo/repository/files/docs%2Fguide.md/raw?ref=v2"
      );
    });

    test("uses the configured API base", async () => {
      const { fetcher, fs } = setup(
        {
          "https://git.example.com/api/v4/projects/group%2Frepo/repository/archive.zip?sha=HEAD": binaryResponse(
            makeZipball("top", { "x.txt": "x" })
          ),
        },
        { gitlab: { apiBase: "https://git.example.com/api/v4/" } }
      );

      await fetcher.fetch("gitlab://group/repo", "/out");

      expect(fs.readText("/out/x.txt")).toBe("x");
    });

    test("applies the branch option when the URI names no ref", async () => {
      const { fetcher, http } = setup({
        [`${GITLAB}/projects/group%2Frepo/repository/archive.zip?sha=dev&path=docs`]: binaryResponse(
          makeZipball("top", { "docs/a.md": "a" })
        ),
      });

      await fetcher.fetch("gitlab://group/repo//docs", "/out", { branch: "dev" });

      expect(http.calls[0]?.url).toBe(`${GITLAB}/projects/group%2Frepo/repository/archive.zip?sha=dev&path=docs`);
    });

    test("the ref in the URI wins over the branch option", async () => {
      const { fetcher, http } = setup({
        [`${GITLAB}/projects/group%2Frepo/repository/archive.zip?sha=main`]: binaryResponse(
          makeZipball("top", { "a.md": "a" })
        ),
      });

      await fetcher.fetch("gitlab://group/repo@main", "/out", { branch: "dev" });

      expect(http.calls[0]?.url).toBe(`${GITLAB}/projects/group%2Frepo/repository/archive.zip?sha=main`);
    });

    test("explicit repo kind ignores the subpath", async () => {
      const { fetcher, fs } = setup({
        [`${GITLAB}/projects/group%2Frepo/repository/archive.zip?sha=HEAD`]: binaryResponse(
          makeZipball("top", { "docs/a.md": "a" })
        ),
      });

      await fetcher.fetch("gitlab://group/repo//docs", "/out", { kind: "repo" });

      expect(fs.readText("/out/docs/a.md")).toBe("a");
    });

    test("throws HttpError on a non-2xx response", async () => {
      const { fetcher } = setup({
        [`${GITLAB}/projects/group%2Frepo/repository/files/a.txt/raw?ref=HEAD`]: errorResponse(401, "Unauthorized"),
      });

      const promise = fetcher.fetch("gitlab://group/repo//a.txt", "/out");

      await expect(promise).rejects.toThrow(HttpError);
      await expect(promise).rejects.toThrow(
        `HTTP 401 Unauthorized for ${GITLAB}/projects/group%2Frepo/repository/files/a.txt/raw?ref=HEAD`
      );
    });

    test("removes the temp archive when extraction fails", async () => {
      const { fetcher, fs } = setup({
        [`${GITLAB}/projects/group%2Frepo/repository/archive.zip?sha=HEAD`]: binaryResponse("not a zip"),
      });

      await expect(fetcher.fetch("gitlab://group/repo", "/out")).rejects.toThrow(ExtractionError);
      expect(tempFilesLeft(fs.files)).toEqual([]);
    });

    test("rejects a malformed URI before any request", async () => {
      const { fetcher, http } = setup({});

      await expect(fetcher.fetch("gitlab://repo", "/out")).rejects.toThrow(ParseError);
      expect(http.calls).toHaveLength(0);
    });
  });

  describe("GitHub", () => {
    test("fetches a file with the raw media type", async () => {
      const { fetcher, fs, http } = setup(
        { [`${GITHUB}/repos/octocat/hello/contents/src/a.txt?ref=main`]: binaryResponse("hello") },
        { github: { token: "test-secret" } }
      );

      const result = await fetcher.fetch("github://octocat/hello@main//src/a.txt", "/out");

      expect(result).toBe("/out/a.txt");
      expect(fs.readText("/out/a.txt")).toBe("hello");
      expect(http.calls[0]?.headers).toEqual({
        accept: "application/vnd.github.raw",
        "user-agent": "artifetch",
        authorization: "Bearer test-secret",
      });
    });

    test("fetches a directory from the zipball", async () => {
      const { fetcher, fs } = setup({
        [`${GITHUB}/repos/octocat/hello/zipball/v1`]: binaryResponse(
          makeZipball("octocat-hello-abc", { "docs/guide.md": "g", "src/x.ts": "x" })
        ),
      });

      await fetcher.fetch("github://octocat/hello@v1//docs", "/out");

      expect(fs.readText("/out/guide.md")).toBe("g");
      expect(fs.exists("/out/src")).toBe(false);
    });

    test("fetches a whole repository at HEAD", async () => {
      const { fetcher, fs } = setup({
        [`${GITHUB}/repos/octocat/hello/zipball/HEAD`]: binaryResponse(makeZipball("top", { "README.md": "r" })),
      });

      await fetcher.fetch("github://octocat/hello", "/out");

      expect(fs.readText("/out/README.md")).toBe("r");
    });
  });
});
