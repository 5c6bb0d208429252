/**
 * The slice of a readline/promises interface the y/N prompts need
 */
export interface LineReader {
  question(query: string, options: { signal?: AbortSignal }): Promise<string>;
}

/**
 * Ask on the interface that already owns stdin. Anything but a y answer is no.
 */
export async function askYesNo(rl: LineReader, query: string, signal?: AbortSignal): Promise<boolean> {
  const answer = await rl.question(`${query} (y/N) `, { signal });
  return answer.trim().toLowerCase().startsWith("y");
}
