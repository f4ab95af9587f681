export { findRoots, type RootOptions } from "./roots";
export {
  bracketRoots,
  searchBrackets,
  type BracketOptions,
  type BracketSearch,
} from "./math/bracket";
export { extractBrackets, isPointBracket, isSignChange } from "./math/extract";
export { SampleStore } from "./math/samples";
export { createEvaluator, identity, signOf, type Evaluator } from "./math/evaluate";
export { bisectRoot, bisectionRefiner, type RootRefiner, type RootResult } from "./math/root";
export { evalPoly, polynomial } from "./math/poly";
export {
  SobolSequence,
  defaultSequence,
  type SequenceFactory,
  type SequenceSource,
} from "./sequence/sobol";
export { RootFindingError, RootRefinementError, SignEvaluationError } from "./errors";
