export type DefenseEffect = "blocks next attack" | "dodge next attack";

export interface Move {
  name: string;
  damage: number;
  cooldown: number;
  effect?: string;
}

export interface Character {
  name: string;
  health: number;
  defense: number;
  moves: Move[];
}

export type Side = "player" | "opponent";

export interface Combatant {
  side: Side;
  base: Character;
  health: number;
  cooldowns: Map<string, number>;
  defending: boolean;
}

export interface BattleConfig {
  seed?: string;
  /** Stop after this many turns; unlimited when absent. */
  maxTurns?: number;
}

export interface CombatantSnapshot {
  name: string;
  health: number;
}

interface EventBase {
  turn: number;
  description: string;
}

export interface TurnEvent extends EventBase {
  kind: "turn";
  side: Side;
  player: CombatantSnapshot;
  opponent: CombatantSnapshot;
}

export interface CooldownEvent extends EventBase {
  kind: "cooldown";
  actor: string;
  move: string;
  remaining: number;
}

export interface NullifiedEvent extends EventBase {
  kind: "nullified";
  actor: string;
  target: string;
  move: string;
}

export interface DefendEvent extends EventBase {
  kind: "defend";
  actor: string;
  move: string;
  effect: DefenseEffect;
}

export interface AttackEvent extends EventBase {
  kind: "attack";
  actor: string;
  target: string;
  move: string;
  damage: number;
  hpBefore: number;
  hpAfter: number;
  effect?: string;
}

export interface ResultEvent extends EventBase {
  kind: "result";
  winner: Side;
  reason: BattleEndReason;
}

export type BattleEndReason = "knockout" | "turnLimit";

export type MoveEvent = CooldownEvent | NullifiedEvent | DefendEvent | AttackEvent;

export type BattleEvent = TurnEvent | MoveEvent | ResultEvent;

export interface MoveOutcome {
  executed: boolean;
  event: MoveEvent;
}

export interface BattleResult {
  config: BattleConfig;
  winner: Side;
  reason: BattleEndReason;
  turns: number;
  finalState: {
    player: CombatantSnapshot;
    opponent: CombatantSnapshot;
  };
  log: BattleEvent[];
}

/** Line-oriented question/answer channel to the human player. */
export interface Prompt {
  ask(question: string): Promise<string>;
}

export type Output = (line: string) => void;
