/**
 * Reply parsing shared by the strategies
 */

const FINAL_ANSWER_PATTERN = /final answer\s*:\s*([\s\S]*)$/i;
const ANSWER_LINE_PATTERN = /^\s*(?:final\s+)?answer\s*:[ \t]*(.*)$/im;
const STEP_PATTERN = /^\s*step\s+\d+\s*[:.)-]\s*(.+)$/gim;
const NUMBERED_PATTERN = /^\s*(\d+)[.)]\s+(.+)$/gm;

/**
 * Text after a "Final Answer:" marker, or null when there is none
 */
export function extractFinalAnswer(text: string): string | null {
  const match = FINAL_ANSWER_PATTERN.exec(text);
  if (!match) return null;
  const answer = (match[1] ?? "").trim();
  return answer === "" ? null : answer;
}

/**
 * Rest of the first "Answer:" or "Final Answer:" line
 */
export function extractAnswerLine(text: string): string | null {
  const match = ANSWER_LINE_PATTERN.exec(text);
  if (!match) return null;
  const answer = (match[1] ?? "").trim();
  return answer === "" ? null : answer;
}

/**
 * "Step N: ..." lines in order
 */
export function extractSteps(text: string): string[] {
  return Array.from(text.matchAll(STEP_PATTERN), (m) => (m[1] ?? "").trim()).filter(
    (step) => step !== "",
  );
}

/**
 * Items of a "1. ..." / "2) ..." list in order
 */
export function parseNumberedList(text: string): string[] {
  return Array.from(text.matchAll(NUMBERED_PATTERN), (m) => (m[2] ?? "").trim()).filter(
    (item) => item !== "",
  );
}

/**
 * The JSON object spanning the first "{" to the last "}", or null when that
 * span does not parse
 */
export function extractJsonObject(text: string): unknown {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return null;

  try {
    const parsed: unknown = JSON.parse(text.slice(start, end + 1));
    return parsed;
  } catch {
    return null;
  }
}

/**
 * Scores from the first JSON object in the text carrying a `scores` array of
 * exactly `expected` numbers between 0 and 1
 */
export function parseScores(text: string, expected: number): number[] | null {
  const parsed = extractJsonObject(text);
  if (parsed === null || typeof parsed !== "object" || !("scores" in parsed)) return null;
  const scores: unknown = parsed.scores;
  if (!Array.isArray(scores) || scores.length !== expected) return null;

  const numbers: number[] = [];
  for (const score of scores) {
    if (typeof score !== "number" || !Number.isFinite(score) || score < 0 || score > 1) {
      return null;
    }
    numbers.push(score);
  }
  return numbers;
}
