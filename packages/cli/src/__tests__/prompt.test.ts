import { describe, it, expect, afterEach, vi } from "vitest";
import { PassThrough, Readable } from "node:stream";
import { readPassword } from "../prompt.js";
import { CliError } from "../args.js";

function terminal(): PassThrough & { isTTY: boolean } {
  return Object.assign(new PassThrough(), { isTTY: true });
}

function captureStderr(): () => string {
  const spy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  return () => spy.mock.calls.map((c) => String(c[0])).join("");
}

describe("readPassword", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reads the first line of piped input", async () => {
    const input = Readable.from([Buffer.from("s3cret\nsecond line\n")]);
    await expect(readPassword("Password: ", input)).resolves.toBe("s3cret");
  });

  it("returns an empty string for empty input", async () => {
    const input = Readable.from([Buffer.from("")]);
    await expect(readPassword("Password: ", input)).resolves.toBe("");
  });

  it("reads a line from a terminal without echoing it", async () => {
    const stderr = captureStderr();
    const input = terminal();

    const pending = readPassword("Password: ", input);
    input.write("s3cret\n");

    await expect(pending).resolves.toBe("s3cret");
    const written = stderr();
    expect(written).toContain("Password: ");
    expect(written).not.toContain("s3cret");
    expect(written.endsWith("\n")).toBe(true);
  });

  it("rejects with exit code 130 on Ctrl-C", async () => {
    captureStderr();
    const input = terminal();

    const pending = readPassword("Password: ", input);
    input.write("s3\x03");

    const error: unknown = await pending.catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CliError);
    expect(error).toMatchObject({ message: "Cancelled.", exitCode: 130 });
  });
});
