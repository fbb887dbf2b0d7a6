/**
 * Default prompts per strategy. A configured systemPrompt replaces these.
 */

export const REACT_SYSTEM_PROMPT = [
  "You are a careful assistant that solves tasks step by step.",
  "Call a tool when you need information or computation you do not have.",
  "When you know the answer, reply with 'Final Answer: <answer>'.",
].join("\n");

export const CHAIN_OF_THOUGHT_SYSTEM_PROMPT = [
  "You reason through problems in explicit numbered steps.",
  "Write each step on its own line as 'Step N: <reasoning>'.",
  "Finish with a line 'Answer: <answer>'.",
].join("\n");

export const TREE_OF_THOUGHTS_SYSTEM_PROMPT = [
  "You explore several lines of reasoning before committing to one.",
  "Follow the format each message asks for exactly.",
].join("\n");

export const GRAPH_OF_THOUGHTS_SYSTEM_PROMPT = [
  "You build a graph of related thoughts: propose ideas, rate them and link them.",
  "Follow the format each message asks for exactly.",
].join("\n");

export const RECURSIVE_SYSTEM_PROMPT = [
  "You answer questions about a large context you cannot see all at once.",
  "Use the context_* tools to inspect it and workspace_* tools to keep notes.",
  "When you know the answer, reply with 'Final Answer: <answer>'.",
].join("\n");

export function repairPrompt(reason: string): string {
  return `Your previous reply could not be used (${reason}). Reply again in the required format.`;
}
