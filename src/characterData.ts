// Roster loading. A roster file is JSON or YAML with a top-level
// `characters` array; anything malformed is fatal before a battle starts.

import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import type { Character, DefenseEffect, Move } from "./types.js";

export const DEFENSE_EFFECTS: readonly DefenseEffect[] = ["blocks next attack", "dodge next attack"];

export function isDefenseEffect(effect: string | undefined): effect is DefenseEffect {
  return DEFENSE_EFFECTS.some((e) => e === effect);
}

export class CharacterDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CharacterDataError";
  }
}

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(where: string, message: string): never {
  throw new CharacterDataError(`${where}: ${message}`);
}

function readInteger(
  fields: Fields,
  key: string,
  where: string,
  opts: { min: number; fallback?: number }
): number {
  const value = fields[key];
  if (value === undefined && opts.fallback !== undefined) return opts.fallback;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    fail(`${where}.${key}`, "must be an integer");
  }
  if (value < opts.min) {
    fail(`${where}.${key}`, `must be at least ${opts.min}`);
  }
  return value;
}

function parseMove(entry: unknown, where: string): Move {
  if (!isRecord(entry)) fail(where, "move must be an object");
  const keys = Object.keys(entry);
  if (keys.length === 0) fail(where, "move is empty");

  // Either { "Punch": { damage, cooldown } } or { "Punch": ..., damage, cooldown }.
  const name = keys[0];
  const nested = entry[name];
  const stats = keys.length === 1 && isRecord(nested) ? nested : entry;
  const at = `${where} (${name})`;

  const effectValue = stats["effect"];
  let effect: string | undefined;
  if (effectValue !== undefined) {
    if (typeof effectValue !== "string") fail(`${at}.effect`, "must be a string");
    effect = effectValue;
  }
  const defensive = isDefenseEffect(effect);

  const move: Move = {
    name,
    damage: readInteger(stats, "damage", at, { min: 0, fallback: defensive ? 0 : undefined }),
    cooldown: readInteger(stats, "cooldown", at, { min: 0, fallback: 0 }),
  };
  if (effect !== undefined) move.effect = effect;
  return move;
}

function parseCharacter(entry: unknown, where: string): Character {
  if (!isRecord(entry)) fail(where, "character must be an object");
  const name = entry["name"];
  if (typeof name !== "string" || name.trim() === "") {
    fail(`${where}.name`, "must be a non-empty string");
  }

  const rawMoves = entry["player_moves"] ?? entry["moves"];
  if (!Array.isArray(rawMoves) || rawMoves.length === 0) {
    fail(`${where}.player_moves`, "must be a non-empty array");
  }

  const moves = rawMoves.map((m: unknown, i) => parseMove(m, `${where}.player_moves[${i}]`));
  const seen = new Set<string>();
  for (const move of moves) {
    if (seen.has(move.name)) fail(`${where}.player_moves`, `duplicate move "${move.name}"`);
    seen.add(move.name);
  }

  return {
    name,
    health: readInteger(entry, "health", where, { min: 1 }),
    defense: readInteger(entry, "defense", where, { min: 0 }),
    moves,
  };
}

export function parseRoster(data: unknown): Character[] {
  if (!isRecord(data)) fail("roster", "must be an object");
  const list = data["characters"];
  if (!Array.isArray(list)) fail("characters", "must be an array");
  if (list.length < 2) fail("characters", "at least two characters are required");

  const roster = list.map((c: unknown, i) => parseCharacter(c, `characters[${i}]`));
  const seen = new Set<string>();
  for (const character of roster) {
    if (seen.has(character.name)) fail("characters", `duplicate character "${character.name}"`);
    seen.add(character.name);
  }
  return roster;
}

export function loadRosterFromFile(filePath: string): Character[] {
  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json" && ext !== ".yaml" && ext !== ".yml") {
    throw new CharacterDataError(`Unsupported character file extension: ${ext || "(none)"}`);
  }

  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CharacterDataError(`Cannot read character file ${filePath}: ${reason}`);
  }

  let data: unknown;
  try {
    data = ext === ".json" ? JSON.parse(raw) : yaml.load(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CharacterDataError(`Cannot parse character file ${filePath}: ${reason}`);
  }

  try {
    return parseRoster(data);
  } catch (err) {
    if (err instanceof CharacterDataError) {
      throw new CharacterDataError(`${filePath}: ${err.message}`);
    }
    throw err;
  }
}
