/**
 * Prompt generation: sampling engine, variable scopes and the
 * PromptGenerator facade.
 */

export { generate, type GenerateOptions } from "./engine.js";
export { PromptGenerator, type PromptGeneratorOptions } from "./prompt-generator.js";
export { renderOnce, applyWrap } from "./walk.js";
export { enumerate, enumerateDistinct, type Branch } from "./enumerate.js";
export { variantChoices, probabilityChoices } from "./choices.js";
export { VariableScope, evaluated, deferred, type Binding, type DeferredBinding } from "./scope.js";
export { CyclicalState } from "./state.js";
export { createSeededRandom, randomInt, weightedIndex, type RandomSource } from "./random.js";
export type { EmptyWildcardPolicy, GenerationEnvironment } from "./environment.js";
export {
  GenerationError,
  UnresolvedWildcardError,
  EmptyWildcardError,
  UnknownVariableError,
} from "./errors.js";
