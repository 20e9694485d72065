import { z } from "zod";

export const CONTROL_CONTRACT_VERSION = "1.0.0";

export const supportedControlMethods = [
  "ping",
  "startSession",
  "stopSession",
  "getSessionState",
  "listSessions",
  "shutdown"
] as const;

const requestIdSchema = z.union([z.string(), z.number()]);

/** One JSON line read from stdin. `params` defaults to an empty object when omitted. */
export const controlRequestEnvelopeSchema = z.object({
  id: requestIdSchema.optional(),
  method: z.string().min(1),
  params: z.record(z.string(), z.unknown()).optional()
});

const controlErrorSchema = z.object({ message: z.string().min(1) });

/** One JSON line written to stdout; failures carry `error`, successes never do. */
export const controlResponseEnvelopeSchema = z
  .object({
    id: requestIdSchema.optional(),
    ok: z.boolean(),
    result: z.unknown().optional(),
    error: controlErrorSchema.optional()
  })
  .refine((response) => response.ok === (response.error === undefined), {
    path: ["error"],
    message: "error is present exactly when ok is false"
  });

export const sessionNameParamsSchema = z.object({
  name: z.string().min(1)
});

export const startSessionParamsSchema = z
  .object({
    name: z.string().min(1),
    configPath: z.string().min(1).optional(),
    config: z.record(z.string(), z.unknown()).optional()
  })
  .superRefine((value, context) => {
    if ((value.configPath === undefined) === (value.config === undefined)) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["config"],
        message: "exactly one of 'configPath' or 'config' is required"
      });
    }
  });

export type ControlResponseEnvelope = z.infer<typeof controlResponseEnvelopeSchema>;
