export {
  MonteCarloTreeSearch,
  DEFAULT_EXPLORATION_WEIGHT,
} from "./MonteCarloTreeSearch";
export type { MonteCarloTreeSearchOptions, NodeStats } from "./MonteCarloTreeSearch";
