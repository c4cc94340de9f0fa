export { ActorSchema, parseActor } from './schema';
export type { Actor } from './schema';
export {
  train,
  rest,
  applyFatigueDecay,
  gainWeight,
  whenFatigued,
  processActor,
  trainingDay
} from './modifiers';
export { describeActor, fatiguedNames } from './report';
