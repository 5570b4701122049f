/**
 * Command: ranktok list
 */
import { listEncodingNames } from "@ranktok/tokenizers";

export async function listCmd(_args: string[]): Promise<void> {
  for (const name of listEncodingNames()) console.log(name);
}
