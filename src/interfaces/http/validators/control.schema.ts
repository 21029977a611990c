import { z } from "zod";

export const setPlayerIdSchema = z.object({
  player_id: z.union([z.string(), z.number().int().nonnegative()]),
});

export const setServerUrlSchema = z.object({
  server_url: z.string().min(1),
});
