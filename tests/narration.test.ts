import { describe, expect, it } from "vitest";
import { formatEvent } from "../src/narration.js";

describe("formatEvent", () => {
  it("prints both healths before announcing the turn", () => {
    expect(
      formatEvent({
        kind: "turn",
        turn: 1,
        side: "player",
        player: { name: "Alpha", health: 20 },
        opponent: { name: "Beta", health: 15 },
        description: "Your turn!",
      })
    ).toEqual(["", "Alpha Health: 20", "Beta Health: 15", "", "Your turn!"]);
  });

  it("adds a line for an attack's extra effect", () => {
    const base = {
      kind: "attack" as const,
      turn: 2,
      actor: "Alpha",
      target: "Beta",
      move: "Headbutt",
      damage: 3,
      hpBefore: 20,
      hpAfter: 17,
      description: "Alpha used Headbutt! It dealt 3 damage.",
    };
    expect(formatEvent(base)).toEqual(["Alpha used Headbutt! It dealt 3 damage."]);
    expect(formatEvent({ ...base, effect: "stun" })).toEqual([
      "Alpha used Headbutt! It dealt 3 damage.",
      "Effect applied: stun",
    ]);
  });

  it("prints the description of other move outcomes as is", () => {
    expect(
      formatEvent({ kind: "cooldown", turn: 3, actor: "Beta", move: "Kick", remaining: 1, description: "Kick is on cooldown!" })
    ).toEqual(["Kick is on cooldown!"]);
  });

  it("separates the verdict with a blank line", () => {
    expect(
      formatEvent({ kind: "result", turn: 6, winner: "player", reason: "knockout", description: "You won! CPU is defeated." })
    ).toEqual(["", "You won! CPU is defeated."]);
  });

  it("explains a turn limit before the verdict", () => {
    expect(
      formatEvent({ kind: "result", turn: 4, winner: "opponent", reason: "turnLimit", description: "You lost! CPU wins." })
    ).toEqual(["", "Turn limit of 4 reached.", "You lost! CPU wins."]);
  });
});
