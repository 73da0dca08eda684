/**
 * Toss Up message keys and the rendering helpers the game engine calls.
 */
import type { CatalogResolver } from "../../catalog/resolver";
import {
  SHARED_MESSAGES,
  createMessenger,
  type MessageArgs,
  type MessageSchema,
  type Messenger,
} from "../schema";

export const TOSSUP_MESSAGES = {
  "tossup-roll-first": ["count"],
  "tossup-roll-remaining": ["count"],
  "tossup-bank": ["points"],
  "tossup-need-points": [],
  "tossup-you-roll": ["results"],
  "tossup-player-rolls": ["player", "results"],
  "tossup-you-bust": ["points"],
  "tossup-player-busts": ["player", "points"],
  "tossup-you-have-points": ["turn_points", "dice_count"],
  "tossup-player-has-points": ["player", "turn_points", "dice_count"],
  "tossup-you-get-fresh": ["count"],
  "tossup-player-gets-fresh": ["player", "count"],
  "tossup-you-bank": ["points", "total"],
  "tossup-player-banks": ["player", "points", "total"],
  "tossup-turn-start": ["player", "score"],
  "tossup-winner": ["player", "score"],
  "tossup-tie-tiebreaker": ["players"],
  "tossup-dice-green": ["count"],
  "tossup-dice-yellow": ["count"],
  "tossup-dice-red": ["count"],
  "tossup-set-starting-dice": ["count"],
  "tossup-enter-starting-dice": [],
  "tossup-option-changed-dice": ["count"],
  "tossup-set-rules-variant": ["variant"],
  "tossup-select-rules-variant": [],
  "tossup-option-changed-rules": ["variant"],
  "tossup-rules-standard-desc": [],
  "tossup-rules-playpalace-desc": [],
} as const satisfies MessageSchema;

export const TOSSUP_SCHEMA = { ...SHARED_MESSAGES, ...TOSSUP_MESSAGES } as const;

export type TossUpSchema = typeof TOSSUP_SCHEMA;
export type TossUpMessenger = Messenger<TossUpSchema>;

export function createTossUpMessenger(resolver: CatalogResolver): TossUpMessenger {
  return createMessenger(resolver, TOSSUP_SCHEMA);
}

type TossUpKey = keyof typeof TOSSUP_MESSAGES;

/** Keys with a first-person variant; each maps to its third-person twin. */
export type PersonalKey = Extract<TossUpKey, `tossup-you-${string}`>;
type ThirdPersonKey = Extract<TossUpKey, `tossup-player-${string}`>;

const THIRD_PERSON: Record<PersonalKey, ThirdPersonKey> = {
  "tossup-you-roll": "tossup-player-rolls",
  "tossup-you-bust": "tossup-player-busts",
  "tossup-you-have-points": "tossup-player-has-points",
  "tossup-you-get-fresh": "tossup-player-gets-fresh",
  "tossup-you-bank": "tossup-player-banks",
};

export interface PersonalMessageInput<K extends PersonalKey> {
  locale: string;
  viewerId: string;
  actorId: string;
  actorName: string;
  key: K;
  args: MessageArgs<TossUpSchema, K>;
}

/**
 * The acting player hears "You bank 5 points", everyone else hears
 * "Ana banks 5 points" with the actor's name bound to { $player }.
 */
export function personalMessage<K extends PersonalKey>(
  resolver: CatalogResolver,
  input: PersonalMessageInput<K>,
): string {
  const own = input.viewerId === input.actorId;
  const key = own ? input.key : THIRD_PERSON[input.key];
  const args = own ? input.args : { ...input.args, player: input.actorName };

  const out = resolver.resolve(input.locale, key, args, { missingKey: "key" });
  if ("error" in out) throw out.error;
  return out.data;
}

export interface RollCounts {
  green: number;
  yellow: number;
  red: number;
}

/**
 * ["3 green", "2 yellow"] for the { $results } list argument. Colors with a
 * zero count are left out; order is green, yellow, red.
 */
export function rollResultParts(
  messenger: TossUpMessenger,
  locale: string,
  roll: RollCounts,
): string[] {
  const parts: string[] = [];
  if (roll.green > 0) parts.push(messenger.text(locale, "tossup-dice-green", { count: roll.green }));
  if (roll.yellow > 0) parts.push(messenger.text(locale, "tossup-dice-yellow", { count: roll.yellow }));
  if (roll.red > 0) parts.push(messenger.text(locale, "tossup-dice-red", { count: roll.red }));
  return parts;
}

export interface FinalScore {
  name: string;
  score: number;
}

/**
 * End screen: the "Final scores:" heading, then "1. Ana: 340 points" per
 * player, highest score first. Ties keep their input order.
 */
export function finalScoreLines(
  messenger: TossUpMessenger,
  locale: string,
  scores: readonly FinalScore[],
): string[] {
  const ranked = [...scores].sort((a, b) => b.score - a.score);
  return [
    messenger.text(locale, "game-final-scores", {}),
    ...ranked.map(
      ({ name, score }, index) =>
        `${index + 1}. ${name}: ${messenger.text(locale, "game-points", { count: score })}`,
    ),
  ];
}
