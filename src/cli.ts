import prompts from "prompts";
import { z } from "zod";
import { InputValidationError } from "./precheck/errors.js";
import { isSupportedTargetVersion, SUPPORTED_TARGET_VERSIONS, type TargetVersion } from "./precheck/version-gate.js";

export const USAGE = "Usage: pg-upgrade-precheck <HOST> <PORT> <USER> <TARGET_VERSION>";

const HOST_RE = /^[a-zA-Z0-9._-]{1,253}$/;
const USER_RE = /^[a-zA-Z0-9_-]{1,63}$/;
const PORT_RE = /^[0-9]{1,5}$/;

const PORT_MESSAGE = "Invalid port number (must be 1-65535)";

const targetMessage = (raw: string) =>
  `Invalid target version '${raw}' (supported versions: ${SUPPORTED_TARGET_VERSIONS.join(", ")})`;

const CliArgsSchema = z.object({
  host: z.string().regex(HOST_RE, "Invalid hostname format"),
  port: z
    .string()
    .regex(PORT_RE, PORT_MESSAGE)
    .transform(Number)
    .refine((n) => n >= 1 && n <= 65_535, PORT_MESSAGE),
  user: z.string().regex(USER_RE, "Invalid username format"),
  targetVersion: z.string().transform((raw, ctx): TargetVersion => {
    const n = /^[0-9]{1,3}$/.test(raw) ? Number(raw) : Number.NaN;
    if (!isSupportedTargetVersion(n)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: targetMessage(raw) });
      return z.NEVER;
    }
    return n;
  }),
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

/** Validates the four positional arguments before anything touches the network. */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  if (argv.length !== 4) throw new InputValidationError("invalid_input", USAGE);
  const [host, port, user, targetVersion] = argv;
  const parsed = CliArgsSchema.safeParse({ host, port, user, targetVersion });
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new InputValidationError("invalid_input", first?.message ?? USAGE, {
      field: first?.path.join(".") ?? null,
    });
  }
  return parsed.data;
}

export function parseYesNo(answer: string): boolean | null {
  const a = answer.trim().toLowerCase();
  if (a === "yes" || a === "y") return true;
  if (a === "no" || a === "n") return false;
  return null;
}

const YES_NO_HINT = "Please answer yes or no (y/n).";

export function validateYesNo(answer: string): true | string {
  return parseYesNo(answer) === null ? YES_NO_HINT : true;
}

export type Ask = (question: prompts.PromptObject<"value">, options: prompts.Options) => Promise<Record<string, unknown>>;

async function askOne(ask: Ask, question: prompts.PromptObject<"value">): Promise<unknown> {
  let cancelled = false;
  const answers = await ask(question, {
    onCancel: () => {
      cancelled = true;
      return false;
    },
  });
  const value: unknown = answers.value;
  if (cancelled || value === undefined) {
    throw new InputValidationError("prompt_cancelled", "Prompt cancelled; no checks were run.");
  }
  return value;
}

export async function promptPassword(user: string, host: string, ask: Ask = prompts): Promise<string> {
  const value = await askOne(ask, {
    type: "password",
    name: "value",
    message: `Password for ${user}@${host}:`,
  });
  if (typeof value !== "string") {
    throw new InputValidationError("prompt_cancelled", "Prompt cancelled; no checks were run.");
  }
  return value;
}

export async function promptBlueGreen(ask: Ask = prompts): Promise<boolean> {
  const value = await askOne(ask, {
    type: "text",
    name: "value",
    message: "Will you use Blue/Green deployment for this upgrade? (yes/no)",
    validate: validateYesNo,
  });
  const answer = typeof value === "string" ? parseYesNo(value) : null;
  if (answer === null) {
    throw new InputValidationError("invalid_input", YES_NO_HINT);
  }
  return answer;
}
