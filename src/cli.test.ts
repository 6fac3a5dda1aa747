import { describe, test, expect } from "vitest";
import { createCliLogger, formatError, runCli } from "./cli";
import { FetchError, HttpError } from "#/core";
import { binaryResponse, createMockContext } from "#/test-utils/mocks";

const ANSI = /\u001b\[[0-9;]*m/g;

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: {
      stdout: (text: string) => out.push(text),
      stderr: (text: string) => err.push(text),
    },
    stdout: () => out.join("").replace(ANSI, ""),
    stderr: () => err.join("").replace(ANSI, ""),
  };
}

describe("cli", () => {
  test("prints the fetched path and exits 0", async () => {
    const output = capture();
    const mocks = createMockContext({
      responses: new Map([
        ["https://gitlab.com/api/v4/projects/group%2Frepo/repository/files/a.txt/raw?ref=main", binaryResponse("a")],
      ]),
    });

    const code = await runCli(["gitlab://group/repo@main//a.txt", "--dest", "/out"], {
      io: output.io,
      createContext: () => mocks.context,
    });

    expect(code).toBe(0);
    expect(output.stdout()).toBe("/out/a.txt\n");
    expect(mocks.fs.readText("/out/a.txt")).toBe("a");
  });

  test("passes provider, branch and kind through", async () => {
    const output = capture();
    const mocks = createMockContext();

    const code = await runCli(["group/repo", "-d", "/work", "-p", "clone", "-b", "release/1.0"], {
      io: output.io,
      createContext: () => mocks.context,
    });

    expect(code).toBe(0);
    expect(output.stdout()).toBe("/work/repo\n");
    expect(mocks.shell.calls[0]?.args).toContain("release/1.0");
  });

  test("prints the error on stderr and exits 1", async () => {
    const output = capture();
    const mocks = createMockContext();

    const code = await runCli(["group/repo", "-d", "/work"], {
      io: output.io,
      createContext: () => mocks.context,
    });

    expect(code).toBe(1);
    expect(output.stdout()).toBe("");
    expect(output.stderr()).toMatch(/^Error: Cannot detect provider for 'group\/repo'/);
  });

  test("rejects an unknown provider choice", async () => {
    const output = capture();

    const code = await runCli(["group/repo", "--provider", "s3"], {
      io: output.io,
      createContext: () => createMockContext().context,
    });

    expect(code).toBe(1);
    expect(output.stderr()).toContain("argument 's3' is invalid");
  });

  test("logs through the context logger it creates", async () => {
    const output = capture();
    const mocks = createMockContext();

    await runCli(["git@github.com:org/repo.git", "-d", "/work", "--verbose"], {
      io: output.io,
      createContext: (logger) => ({ ...mocks.context, logger }),
    });

    expect(output.stderr()).toContain("Cloning git@github.com:org/repo.git into /work/repo\n");
    expect(output.stderr()).toContain("Fetched via git: /work/repo\n");
  });

  describe("createCliLogger", () => {
    test("drops debug lines unless verbose", () => {
      const lines: string[] = [];
      const logger = createCliLogger((text) => lines.push(text.replace(ANSI, "")), false);

      logger.debug("hidden");
      logger.info("shown");

      expect(lines).toEqual(["shown\n"]);
    });
  });

  describe("formatError", () => {
    test("prefixes the message", () => {
      expect(formatError(new Error("boom")).replace(ANSI, "")).toBe("Error: boom");
    });

    test("names the cause when verbose", () => {
      const error = new FetchError("HTTP 404 Not Found for u", "HTTP_ERROR", new HttpError(404, "Not Found", "u"));

      expect(formatError(error, true).replace(ANSI, "")).toBe("Error: HTTP 404 Not Found for u\n  Cause: HttpError");
    });
  });
});
