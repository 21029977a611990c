import { z } from "zod";
import { isCommandKind } from "#/domain/commands/command";
import { type ContentAssignment } from "#/domain/content/assignment";
import { isSha256Hex, normalizeChecksum } from "#/domain/content/checksum";

/** Ids arrive as numbers from some server versions; the agent keeps strings. */
export const stringIdSchema = z
  .union([z.string().trim().min(1), z.number().int().nonnegative()])
  .transform((value) => String(value));

const checksumSchema = z
  .string()
  .transform(normalizeChecksum)
  .refine(isSha256Hex, "must be a SHA-256 hex digest");

export const contentItemWireSchema = z.object({
  media_ref: z.string().trim().min(1),
  duration: z.number().nonnegative(),
  checksum: checksumSchema,
});

export const contentAssignmentWireSchema = z.object({
  playlist_version: stringIdSchema,
  items: z.array(contentItemWireSchema),
});

export const contentAssignmentSchema = contentAssignmentWireSchema.transform(
  (wire): ContentAssignment => ({
    playlistVersion: wire.playlist_version,
    items: wire.items.map((item) => ({
      mediaRef: item.media_ref,
      duration: item.duration,
      checksum: item.checksum,
    })),
  }),
);

export const toContentAssignmentWire = (assignment: ContentAssignment) => ({
  playlist_version: assignment.playlistVersion,
  items: assignment.items.map((item) => ({
    media_ref: item.mediaRef,
    duration: item.duration,
    checksum: item.checksum,
  })),
});

export const pendingCommandSchema = z.object({
  id: stringIdSchema,
  kind: z.string().refine(isCommandKind, "unknown command kind"),
  issued_at: z.string().nullish(),
});

/** Parts are parsed one by one so that a bad part does not void the others. */
export const heartbeatResponseSchema = z.object({
  pending_command: z.unknown().optional(),
  content_assignment: z.unknown().optional(),
  player_id: z.unknown().optional(),
});

export const registrationLookupSchema = z.object({
  registered: z.boolean(),
  player_id: stringIdSchema.nullish(),
});
