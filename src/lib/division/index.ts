/**
 * Quad division engine.
 *
 * Lifecycle: initialize -> subdivideStep* -> done, with restart / resize /
 * setSeed / changeSetting replacing the model wholesale. The model is
 * immutable; every operation returns a new one.
 */

export {
  PLACEHOLDER_SEED,
  initialize,
  done,
  restart,
  resize,
  setSeed,
  changeSetting,
  regionCount,
} from './model.js';
export { subdivideStep, splitProbability, runToCompletion } from './step.js';
export { chooseAxis, splitRect, randomSplit } from './split.js';
export { validateDivision, assertValidDivision, validatingStep } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export type { QuadDivision, Region, SplitResult, Axis } from './types.js';
