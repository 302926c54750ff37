import type { Rng } from "./seedRng.js";
import { promptForIndex } from "./selection.js";
import type { Combatant, Output, Prompt } from "./types.js";

/** Picks the index of the move a combatant uses this turn. */
export interface MoveController {
  chooseMove(self: Combatant, opponent: Combatant): Promise<number>;
}

export function describeMoves(self: Combatant): string[] {
  return self.base.moves.map(
    (move, i) => `${i + 1}. Move: ${move.name} (Cooldown: ${self.cooldowns.get(move.name) ?? 0})`
  );
}

export function createHumanController(prompt: Prompt, out: Output): MoveController {
  return {
    chooseMove: async (self) => {
      out("");
      out(`${self.base.name}'s moves:`);
      for (const line of describeMoves(self)) out(line);
      const count = self.base.moves.length;
      return promptForIndex(
        prompt,
        out,
        `Choose a move for ${self.base.name} (1-${count}): `,
        count,
        "Invalid move. Try again."
      );
    },
  };
}

// Moves still on cooldown stay in the draw; the engine refuses them and
// the turn is lost.
export function createRandomController(rng: Rng): MoveController {
  return {
    chooseMove: async (self) => rng.nextInt(self.base.moves.length),
  };
}
