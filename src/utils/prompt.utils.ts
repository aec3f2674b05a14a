import * as readline from "readline/promises";

/**
 * Asks a question on the terminal; a blank answer returns null
 */
export async function ask(text: string): Promise<string | null> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  try {
    const answer = await rl.question(`⌨️  ${text}: `);
    const trimmed = answer.trim();
    return trimmed === "" ? null : trimmed;
  } finally {
    rl.close();
  }
}
