import { createInterface } from "readline/promises";

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Ask a yes/no question on the terminal. Anything but `y`/`yes` declines.
 *
 * While the question is open the terminal is in raw mode and Ctrl+C reaches readline
 * rather than the process, so it aborts `controller` here. An aborted run declines.
 */
export async function confirmOnTerminal(
  question: string,
  controller: AbortController,
  streams: PromptStreams = { input: process.stdin, output: process.stdout }
): Promise<boolean> {
  if (controller.signal.aborted) {
    return false;
  }

  const rl = createInterface({ input: streams.input, output: streams.output });
  rl.once("SIGINT", () => controller.abort());
  try {
    const answer = await rl.question(`${question} [y/N] `, { signal: controller.signal });
    return ["y", "yes"].includes(answer.trim().toLowerCase());
  } catch (error) {
    if (controller.signal.aborted) {
      return false;
    }
    throw error;
  } finally {
    rl.close();
  }
}
