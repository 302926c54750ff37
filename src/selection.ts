import type { Rng } from "./seedRng.js";
import type { Character, Output, Prompt } from "./types.js";

export const NOT_A_NUMBER = "Invalid input. Please enter a number.";

export type Selection = { ok: true; index: number } | { ok: false; reason: "notANumber" | "outOfRange" };

/** Parses a 1-based menu answer into a 0-based index below `count`. */
export function parseSelection(answer: string, count: number): Selection {
  const trimmed = answer.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return { ok: false, reason: "notANumber" };
  const index = Number(trimmed) - 1;
  if (index < 0 || index >= count) return { ok: false, reason: "outOfRange" };
  return { ok: true, index };
}

/** Keeps asking until the answer is a valid choice. */
export async function promptForIndex(
  prompt: Prompt,
  out: Output,
  question: string,
  count: number,
  outOfRangeMessage: string
): Promise<number> {
  for (;;) {
    const selection = parseSelection(await prompt.ask(question), count);
    if (selection.ok) return selection.index;
    out(selection.reason === "notANumber" ? NOT_A_NUMBER : outOfRangeMessage);
  }
}

export interface Matchup {
  player: Character;
  opponent: Character;
}

export async function selectCharacters(
  roster: readonly Character[],
  prompt: Prompt,
  rng: Rng,
  out: Output
): Promise<Matchup> {
  if (roster.length < 2) {
    throw new RangeError("At least two characters are needed for a battle");
  }

  out("Available characters:");
  roster.forEach((c, i) => {
    out(`${i + 1}. ${c.name} (Health: ${c.health}) (Defense: ${c.defense})`);
  });

  const choice = await promptForIndex(
    prompt,
    out,
    `Choose your character (1-${roster.length}): `,
    roster.length,
    "Invalid choice. Please select a valid number."
  );

  const player = roster[choice];
  const opponent = rng.pick(roster.filter((_, i) => i !== choice));
  out(`You chose ${player.name}. CPU chose ${opponent.name}.`);
  return { player, opponent };
}
