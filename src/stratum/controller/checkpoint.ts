/**
 * Signed checkpoint tokens
 *
 * Format: `stc1.<payload>.<signature>` (or `stc1z.` with a gzipped payload),
 * both parts base64url. The signature is an HMAC-SHA256 over everything
 * before the last dot.
 */

import crypto from "node:crypto";
import zlib from "node:zlib";
import { z } from "zod";
import {
  CheckpointReasonSchema,
  StrategyStateSchema,
  type CheckpointReason,
  type StrategyState,
} from "../machine/schema.js";

export const CHECKPOINT_VERSION = 1;

const PREFIX = "stc1";
const PREFIX_GZIP = "stc1z";

export type CheckpointErrorCode = "malformed" | "bad_signature" | "expired" | "invalid_state";

export class CheckpointError extends Error {
  constructor(
    readonly code: CheckpointErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "CheckpointError";
  }
}

const EnvelopeSchema = z.object({
  v: z.literal(CHECKPOINT_VERSION),
  reason: CheckpointReasonSchema,
  issuedAt: z.number(),
  expiresAt: z.number().nullable(),
  state: z.unknown(),
});

export interface CheckpointPayload {
  v: typeof CHECKPOINT_VERSION;
  reason: CheckpointReason;
  issuedAt: number;
  expiresAt: number | null;
  state: StrategyState;
}

export interface IssueOptions {
  secret: string;
  ttlMs?: number;
  compress?: boolean;
  now?: number;
}

export interface VerifyOptions {
  secret: string;
  now?: number;
}

function sign(input: string, secret: string): Buffer {
  return crypto.createHmac("sha256", secret).update(input).digest();
}

/**
 * Encode and sign a state. The state's own token is dropped from the payload.
 */
export function issueCheckpoint(
  state: StrategyState,
  reason: CheckpointReason,
  options: IssueOptions,
): string {
  const issuedAt = options.now ?? Date.now();
  const payload: CheckpointPayload = {
    v: CHECKPOINT_VERSION,
    reason,
    issuedAt,
    expiresAt: options.ttlMs !== undefined ? issuedAt + options.ttlMs : null,
    state: { ...state, checkpointToken: null },
  };

  const json = Buffer.from(JSON.stringify(payload), "utf-8");
  const body = options.compress ? zlib.gzipSync(json) : json;
  const prefix = options.compress ? PREFIX_GZIP : PREFIX;
  const signingInput = `${prefix}.${body.toString("base64url")}`;

  return `${signingInput}.${sign(signingInput, options.secret).toString("base64url")}`;
}

/**
 * Check signature, expiry and shape, and return the payload
 *
 * @throws CheckpointError
 */
export function verifyCheckpoint(token: string, options: VerifyOptions): CheckpointPayload {
  const parts = token.trim().split(".");
  if (parts.length !== 3) {
    throw new CheckpointError("malformed", "Checkpoint token must have three parts");
  }

  const [prefix = "", encoded = "", signature = ""] = parts;
  if (prefix !== PREFIX && prefix !== PREFIX_GZIP) {
    throw new CheckpointError("malformed", `Unknown checkpoint format "${prefix}"`);
  }

  const expected = sign(`${prefix}.${encoded}`, options.secret);
  const actual = Buffer.from(signature, "base64url");
  if (actual.length !== expected.length || !crypto.timingSafeEqual(actual, expected)) {
    throw new CheckpointError("bad_signature", "Checkpoint signature does not match");
  }

  let raw: unknown;
  try {
    const body = Buffer.from(encoded, "base64url");
    const json = prefix === PREFIX_GZIP ? zlib.gunzipSync(body) : body;
    raw = JSON.parse(json.toString("utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CheckpointError("malformed", `Checkpoint payload is unreadable: ${reason}`);
  }

  const envelope = EnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new CheckpointError("malformed", "Checkpoint payload has an unexpected shape");
  }

  const { expiresAt } = envelope.data;
  const now = options.now ?? Date.now();
  if (expiresAt !== null && now > expiresAt) {
    throw new CheckpointError("expired", `Checkpoint expired at ${new Date(expiresAt).toISOString()}`);
  }

  const state = StrategyStateSchema.safeParse(envelope.data.state);
  if (!state.success) {
    const issue = state.error.issues[0];
    throw new CheckpointError(
      "invalid_state",
      `Checkpoint state is invalid${issue ? ` at ${issue.path.join(".")}: ${issue.message}` : ""}`,
    );
  }

  return { ...envelope.data, state: state.data };
}
