import Lineage, { createGeneratingSequence } from "./Lineage";
import LazySequence, { DerivedSequence } from "./interfaces/LazySequence";
import Traversal from "./interfaces/Traversal";
import GeneratingSequence from "./sequence/GeneratingSequence";
import GeneratingIterator from "./sequence/iterators/GeneratingIterator";
import type {
  InitialProducer,
  LineageMode,
  LogSettings,
  SequenceJson,
  SuccessorFunction,
  TraversalState,
  TraversalStateKind,
} from "./types/global";
import { SequenceError, UsageError } from "./utils/errors";

export default Lineage;
export type {
  InitialProducer,
  SuccessorFunction,
  LineageMode,
  LogSettings,
  SequenceJson,
  TraversalState,
  TraversalStateKind,
};
export {
  createGeneratingSequence,
  GeneratingSequence,
  GeneratingIterator,
  LazySequence,
  DerivedSequence,
  Traversal,
  UsageError,
  SequenceError,
};
