import type { BattleEvent } from "./types.js";

/** Console lines for one battle event. */
export function formatEvent(event: BattleEvent): string[] {
  switch (event.kind) {
    case "turn":
      return [
        "",
        `${event.player.name} Health: ${event.player.health}`,
        `${event.opponent.name} Health: ${event.opponent.health}`,
        "",
        event.description,
      ];
    case "attack":
      return event.effect !== undefined
        ? [event.description, `Effect applied: ${event.effect}`]
        : [event.description];
    case "cooldown":
    case "nullified":
    case "defend":
      return [event.description];
    case "result":
      return event.reason === "turnLimit"
        ? ["", `Turn limit of ${event.turn} reached.`, event.description]
        : ["", event.description];
  }
}
