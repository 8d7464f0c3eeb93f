import { describe, it, expect } from "vitest";
import { PassThrough } from "node:stream";
import { promptUser } from "../prompt.js";

describe("promptUser", () => {
  it("returns the trimmed answer", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    input.end("  alice  \n");
    await expect(promptUser("Username: ", { input, output })).resolves.toBe("alice");
  });

  it("returns an empty answer when input ends without a line", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    input.end();
    await expect(promptUser("Username: ", { input, output })).resolves.toBe("");
  });
});
