import { createInterface } from "node:readline";

export interface PromptStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/** Resolves to the trimmed answer, or "" when input ends first. */
export async function promptUser(question: string, streams: PromptStreams = {}): Promise<string> {
  const rl = createInterface({
    input: streams.input ?? process.stdin,
    output: streams.output ?? process.stderr,
  });

  return new Promise((res) => {
    let answered = false;
    rl.once("close", () => {
      if (!answered) res("");
    });
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      res(answer.trim());
    });
  });
}
