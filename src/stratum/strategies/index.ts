/**
 * Strategy lookup by name
 */

import type { StrategyName } from "../config/types.js";
import type { StrategyDefinition } from "../machine/strategy.js";
import { chainOfThoughtStrategy } from "./chain-of-thought.js";
import { graphOfThoughtsStrategy } from "./graph-of-thoughts.js";
import { reactStrategy } from "./react.js";
import { recursiveStrategy } from "./recursive.js";
import { treeOfThoughtsStrategy } from "./tree-of-thoughts.js";

const STRATEGIES: Record<StrategyName, StrategyDefinition> = {
  react: reactStrategy,
  chain_of_thought: chainOfThoughtStrategy,
  tree_of_thoughts: treeOfThoughtsStrategy,
  graph_of_thoughts: graphOfThoughtsStrategy,
  recursive: recursiveStrategy,
};

export function getStrategy(name: StrategyName): StrategyDefinition {
  return STRATEGIES[name];
}

export {
  chainOfThoughtStrategy,
  graphOfThoughtsStrategy,
  reactStrategy,
  recursiveStrategy,
  treeOfThoughtsStrategy,
};
