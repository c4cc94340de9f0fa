import 'dotenv/config';
import * as E from 'fp-ts/Either';
import { configure, fromHostMap, logPipe, toHostMap } from '@tabula/core';
import { describeActor, parseActor, processActor, train, rest, whenFatigued, applyFatigueDecay } from './actor';

/**
 * Demo: validate an actor coming from the host, run a training day on it
 * and hand it back as a host map.
 */

configure({ enableLogging: true, logLevel: 'debug' });

const raw: unknown = {
  name: 'Lydia',
  weight: 50,
  fatigue: 0.2,
  gains: 0,
  lastTrained: 0,
  stats: { stamina: 100, health: 100 }
};

const parsed = parseActor(raw);

if (E.isLeft(parsed)) {
  console.error('Rejected actor:', parsed.left.message);
  process.exitCode = 1;
} else {
  const actor = parsed.right;
  console.log('Before:', describeActor(actor));

  processActor(actor, [
    train(4),
    logPipe('trained'),
    whenFatigued(applyFatigueDecay(0.5)),
    rest(8),
    logPipe('rested')
  ]);

  console.log('After: ', describeActor(actor));
  console.log('Host map:', fromHostMap(toHostMap(actor)));
}
