import {
  boolBase,
  expCurve,
  forcePercent,
  forceRange,
  identity,
  ifThen,
  pipe,
  processRecord,
  toGameHours,
  Transform
} from '@tabula/core';
import { Actor } from './schema';

// ---------- Tuning ----------

const FATIGUE_PER_HOUR = 0.1;
const GAINS_PER_HOUR = 0.05;
const WEIGHT_PER_GAIN = 10;
const STAMINA_PER_HOUR = 10;
const EXHAUSTED = 0.8;

const clampWeight = forceRange(0, 100);
const clampStat = forceRange(0, 100);

// Share of fatigue left after `x` game days of rest
const fatigueRemaining = expCurve(-2.3, { x: 0, y: 1 }, { x: 1, y: 0.1 });

// ---------- Modifiers ----------

/**
 * Hours of training: builds fatigue and, unless already spent, gains
 */
export const train = (hours: number): Transform<Actor> => (actor) => ({
  ...actor,
  fatigue: forcePercent(actor.fatigue + hours * FATIGUE_PER_HOUR),
  gains: forcePercent(actor.gains + boolBase(h => h * GAINS_PER_HOUR, actor.fatigue < 1)(hours)),
  stats: { ...actor.stats, stamina: clampStat(actor.stats.stamina - hours * STAMINA_PER_HOUR) }
});

/**
 * Sleep: pending gains turn into weight, stamina and fatigue recover
 */
export const rest = (hours: number): Transform<Actor> => (actor) => ({
  ...actor,
  weight: clampWeight(actor.weight + actor.gains * WEIGHT_PER_GAIN),
  gains: 0,
  fatigue: forcePercent(actor.fatigue - toGameHours(hours)),
  stats: { ...actor.stats, stamina: clampStat(actor.stats.stamina + hours * STAMINA_PER_HOUR) }
});

/**
 * Fatigue fades along an exponential curve over game days
 */
export const applyFatigueDecay = (days: number): Transform<Actor> => (actor) => ({
  ...actor,
  fatigue: forcePercent(actor.fatigue * fatigueRemaining(days))
});

export const gainWeight = (amount: number): Transform<Actor> => (actor) => ({
  ...actor,
  weight: clampWeight(actor.weight + amount)
});

/**
 * Apply `modifier` only to exhausted actors
 */
export const whenFatigued = (modifier: Transform<Actor>): Transform<Actor> => (actor) =>
  ifThen(actor.fatigue >= EXHAUSTED, modifier, identity<Actor>)(actor);

/**
 * Run modifiers on a private copy of `actor` and merge the result back into it.
 * The host keeps the same object; fields the actor does not have are dropped.
 */
export const processActor = (actor: Actor, modifiers: ReadonlyArray<Transform<Actor>>): Actor =>
  processRecord(actor, modifiers);

/**
 * A whole training day: train, then sleep it off
 */
export const trainingDay = (trainingHours: number, sleepHours: number): Transform<Actor> =>
  pipe(train(trainingHours), rest(sleepHours));
