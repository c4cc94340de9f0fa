import { floatToPercentStr, pipe, reduceCommaPretty, seq } from '@tabula/core';
import { Actor } from './schema';

const FATIGUED = 0.8;

/**
 * One-line summary, e.g. `Lydia: weight 50, fatigue 25.00%, gains 10.00%`
 */
export const describeActor = (actor: Actor): string => {
  const parts = [
    `weight ${actor.weight}`,
    `fatigue ${floatToPercentStr(actor.fatigue)}`,
    `gains ${floatToPercentStr(actor.gains)}`
  ];
  return `${actor.name}: ${seq.reduce(parts, '', reduceCommaPretty)}`;
};

/**
 * Names of the actors that need rest, comma separated
 */
export const fatiguedNames: (actors: readonly Actor[]) => string = pipe(
  seq.filter.with((actor: Actor) => actor.fatigue >= FATIGUED),
  seq.map.with((actor: Actor) => actor.name),
  seq.reduce.with('', reduceCommaPretty)
);
