import { isDefenseEffect } from "./characterData.js";
import type { MoveController } from "./controllers.js";
import type {
  BattleConfig,
  BattleEndReason,
  BattleEvent,
  BattleResult,
  Character,
  Combatant,
  CombatantSnapshot,
  MoveOutcome,
  Side,
} from "./types.js";

export type BattlePhase = "ready" | "playerTurn" | "opponentTurn" | "resolved";

export interface BattleEngineOptions {
  controllers: Record<Side, MoveController>;
  config?: BattleConfig;
  onEvent?: (event: BattleEvent) => void;
}

function createCombatant(side: Side, base: Character): Combatant {
  return {
    side,
    base,
    health: base.health,
    cooldowns: new Map(base.moves.map((m): [string, number] => [m.name, 0])),
    defending: false,
  };
}

function snapshotCombatant(c: Combatant): CombatantSnapshot {
  return { name: c.base.name, health: c.health };
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * One duel between the human's character and the computer's. Owns the
 * per-battle health, cooldowns and defense flags; the Character records
 * it was built from are never mutated.
 */
export class BattleEngine {
  readonly player: Combatant;
  readonly opponent: Combatant;
  readonly log: BattleEvent[] = [];
  private readonly config: BattleConfig;
  private readonly controllers: Record<Side, MoveController>;
  private readonly onEvent?: (event: BattleEvent) => void;
  private turn = 0;
  private currentPhase: BattlePhase = "ready";

  constructor(player: Character, opponent: Character, options: BattleEngineOptions) {
    this.player = createCombatant("player", player);
    this.opponent = createCombatant("opponent", opponent);
    this.config = options.config ?? {};
    this.controllers = options.controllers;
    this.onEvent = options.onEvent;
  }

  get phase(): BattlePhase {
    return this.currentPhase;
  }

  resetState(): void {
    for (const c of [this.player, this.opponent]) {
      for (const move of c.base.moves) c.cooldowns.set(move.name, 0);
      c.defending = false;
    }
  }

  executeMove(attacker: Combatant, defender: Combatant, moveIndex: number): MoveOutcome {
    const move = attacker.base.moves[moveIndex];
    if (move === undefined) {
      throw new RangeError(`${attacker.base.name} has no move #${moveIndex + 1}`);
    }

    const remaining = attacker.cooldowns.get(move.name) ?? 0;
    if (remaining > 0) {
      return this.record(false, {
        kind: "cooldown",
        turn: this.turn,
        actor: attacker.base.name,
        move: move.name,
        remaining,
        description: `${move.name} is on cooldown!`,
      });
    }

    if (defender.defending) {
      defender.defending = false;
      attacker.cooldowns.set(move.name, move.cooldown);
      return this.record(true, {
        kind: "nullified",
        turn: this.turn,
        actor: attacker.base.name,
        target: defender.base.name,
        move: move.name,
        description: `${defender.base.name} blocked or dodged the attack!`,
      });
    }

    if (isDefenseEffect(move.effect)) {
      attacker.defending = true;
      attacker.cooldowns.set(move.name, move.cooldown);
      return this.record(true, {
        kind: "defend",
        turn: this.turn,
        actor: attacker.base.name,
        move: move.name,
        effect: move.effect,
        description: `${attacker.base.name} used ${move.name}! ${capitalize(move.effect)}.`,
      });
    }

    const damage = Math.max(move.damage - defender.base.defense, 0);
    const hpBefore = defender.health;
    defender.health -= damage;
    attacker.cooldowns.set(move.name, move.cooldown);
    return this.record(true, {
      kind: "attack",
      turn: this.turn,
      actor: attacker.base.name,
      target: defender.base.name,
      move: move.name,
      damage,
      hpBefore,
      hpAfter: defender.health,
      ...(move.effect !== undefined ? { effect: move.effect } : {}),
      description: `${attacker.base.name} used ${move.name}! It dealt ${damage} damage.`,
    });
  }

  async takeTurn(attacker: Combatant, defender: Combatant): Promise<MoveOutcome> {
    const moveIndex = await this.controllers[attacker.side].chooseMove(attacker, defender);
    return this.executeMove(attacker, defender, moveIndex);
  }

  advanceCooldowns(): void {
    for (const c of [this.player, this.opponent]) {
      for (const [name, remaining] of c.cooldowns) {
        if (remaining > 0) c.cooldowns.set(name, remaining - 1);
      }
    }
  }

  /** Lower final health loses; a tie goes to the player. */
  winner(): Side {
    return this.player.health < this.opponent.health ? "opponent" : "player";
  }

  async runBattle(): Promise<BattleResult> {
    if (this.currentPhase !== "ready") {
      throw new Error(`Battle already ${this.currentPhase === "resolved" ? "resolved" : "in progress"}`);
    }
    this.resetState();

    const { maxTurns } = this.config;
    let reason: BattleEndReason = "knockout";
    let side: Side = "player";

    while (this.player.health > 0 && this.opponent.health > 0) {
      if (maxTurns !== undefined && this.turn >= maxTurns) {
        reason = "turnLimit";
        break;
      }
      this.turn++;
      this.currentPhase = side === "player" ? "playerTurn" : "opponentTurn";

      const [attacker, defender] =
        side === "player" ? [this.player, this.opponent] : [this.opponent, this.player];
      this.emit({
        kind: "turn",
        turn: this.turn,
        side,
        player: snapshotCombatant(this.player),
        opponent: snapshotCombatant(this.opponent),
        description: side === "player" ? "Your turn!" : "CPU's turn!",
      });

      await this.takeTurn(attacker, defender);
      this.advanceCooldowns();
      side = side === "player" ? "opponent" : "player";
    }

    const winner = this.winner();
    this.currentPhase = "resolved";
    this.emit({
      kind: "result",
      turn: this.turn,
      winner,
      reason,
      description: winner === "player" ? "You won! CPU is defeated." : "You lost! CPU wins.",
    });

    return {
      config: this.config,
      winner,
      reason,
      turns: this.turn,
      finalState: {
        player: snapshotCombatant(this.player),
        opponent: snapshotCombatant(this.opponent),
      },
      log: [...this.log],
    };
  }

  private record(executed: boolean, event: MoveOutcome["event"]): MoveOutcome {
    this.emit(event);
    return { executed, event };
  }

  private emit(event: BattleEvent): void {
    this.log.push(event);
    this.onEvent?.(event);
  }
}
