export { unavailablePicker, type FuzzyPicker, type PickOptions } from "./picker.js";
export {
  buildCandidates,
  filesystemCandidates,
  parseCandidate,
  type CandidateTag,
} from "./candidates.js";
export {
  createExplorer,
  loadCommand,
  EXPLORE_ACTIONS,
  type Explorer,
  type ExplorerOptions,
  type ExploreAction,
  type ExploreOutcome,
} from "./explorer.js";
