import type { MoveController } from "../src/controllers.js";
import type { Rng } from "../src/seedRng.js";
import type { Character, Prompt } from "../src/types.js";

export interface ScriptedPrompt extends Prompt {
  questions: string[];
}

export function scriptedPrompt(answers: string[], onExhausted: () => Error = () => new Error("No scripted answer left")): ScriptedPrompt {
  const questions: string[] = [];
  let next = 0;
  return {
    questions,
    ask: async (question) => {
      questions.push(question);
      const answer = answers[next++];
      if (answer === undefined) throw onExhausted();
      return answer;
    },
  };
}

/** Replays the given move indexes, repeating the last one. */
export function fixedController(...indexes: number[]): MoveController {
  let next = 0;
  return {
    chooseMove: async () => indexes[Math.min(next++, indexes.length - 1)],
  };
}

export const firstPickRng: Rng = {
  nextInt: () => 0,
  pick: <T>(items: readonly T[]): T => items[0],
};

export function makeCharacter(overrides: Partial<Character> & Pick<Character, "name">): Character {
  return {
    health: 20,
    defense: 0,
    moves: [{ name: "Tap", damage: 1, cooldown: 0 }],
    ...overrides,
  };
}
