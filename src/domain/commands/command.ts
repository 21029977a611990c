export const COMMAND_KINDS = [
  "reboot",
  "refresh",
  "screen_on",
  "screen_off",
  "screenshot",
] as const;

export type CommandKind = (typeof COMMAND_KINDS)[number];

export interface Command {
  commandId: string;
  kind: CommandKind;
  issuedAt: string | null;
}

export interface CommandWatermark {
  commandId: string;
  issuedAt: string | null;
  executedAt: string;
}

const COMMAND_KIND_SET: ReadonlySet<string> = new Set(COMMAND_KINDS);

export const isCommandKind = (value: string): value is CommandKind =>
  COMMAND_KIND_SET.has(value);

const NUMERIC_ID = /^\d+$/;

const parseTimestamp = (value: string | null): number | null => {
  if (value === null) return null;
  const parsed = Date.parse(value);
  return Number.isFinite(parsed) ? parsed : null;
};

/**
 * The server re-sends the current pending command on every heartbeat until it
 * is superseded, so a command is only applied when it is strictly newer than
 * the last one executed. Ordering uses `issued_at` when both sides carry
 * different ones, then numeric ids, and otherwise treats any different id as
 * newer.
 */
export const isNewerThanWatermark = (
  command: Command,
  watermark: CommandWatermark | null,
): boolean => {
  if (!watermark) return true;
  if (command.commandId === watermark.commandId) return false;

  const commandIssuedAt = parseTimestamp(command.issuedAt);
  const watermarkIssuedAt = parseTimestamp(watermark.issuedAt);
  if (
    commandIssuedAt !== null &&
    watermarkIssuedAt !== null &&
    commandIssuedAt !== watermarkIssuedAt
  ) {
    return commandIssuedAt > watermarkIssuedAt;
  }

  if (NUMERIC_ID.test(command.commandId) && NUMERIC_ID.test(watermark.commandId)) {
    return BigInt(command.commandId) > BigInt(watermark.commandId);
  }

  return true;
};

/** Commands whose side effect ends the agent process. */
export const isProcessTerminating = (kind: CommandKind): boolean =>
  kind === "reboot";
