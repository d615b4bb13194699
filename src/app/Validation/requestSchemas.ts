import { z } from "zod";

export const nonEmptyString = z.string().trim().min(1);

export const coachMessageSchema = z
  .object({
    userId: nonEmptyString.max(128, "userId too long"),
    text: z.string().trim().min(1, "message required").max(1000, "message too long"),
  })
  .strict();

export type CoachMessageInput = z.infer<typeof coachMessageSchema>;
