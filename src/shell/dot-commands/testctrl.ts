import { UserError } from "../../core/errors.ts";
import { logger } from "../../core/logger.ts";
import { openDb } from "../session.ts";
import { atoi, integerValue } from "../tokenize.ts";
import { defineDotCommand } from "./define-dot-command.ts";

const FIRST_CONTROL = 5;
const LAST_CONTROL = 25;

/** `int` reads a decimal prefix; `integer` also takes hex and size suffixes. */
type ArgKind = "none" | "int" | "integer" | "unsigned" | "unsupported";

interface TestControl {
  name: string;
  code: number;
  arg: ArgKind;
}

const CONTROLS: TestControl[] = [
  { name: "prng_save", code: 5, arg: "none" },
  { name: "prng_restore", code: 6, arg: "none" },
  { name: "prng_reset", code: 7, arg: "none" },
  { name: "bitvec_test", code: 8, arg: "unsupported" },
  { name: "fault_install", code: 9, arg: "unsupported" },
  { name: "benign_malloc_hooks", code: 10, arg: "unsupported" },
  { name: "pending_byte", code: 11, arg: "unsigned" },
  { name: "assert", code: 12, arg: "int" },
  { name: "always", code: 13, arg: "int" },
  { name: "reserve", code: 14, arg: "integer" },
  { name: "optimizations", code: 15, arg: "integer" },
  { name: "iskeyword", code: 16, arg: "unsupported" },
  { name: "scratchmalloc", code: 17, arg: "unsupported" },
];

/** Test-control code for a unique prefix of its name, or for a number. */
export function resolveTestControl(option: string): number {
  const found = CONTROLS.filter((control) => control.name.startsWith(option));
  if (found.length > 1) logger.error(`ambiguous option name: "${option}"`);
  const [only] = found;
  return found.length === 1 && only ? only.code : atoi(option);
}

/** The argument a control takes, converted, or `null` when it takes none. */
function controlArgument(control: TestControl | undefined, option: string, args: string[]): number | null {
  const kind = control?.arg ?? "unsupported";
  if (kind === "unsupported") {
    throw new UserError(`CLI support for testctrl ${option} not implemented`);
  }
  if (kind === "none") {
    if (args.length > 0) throw new UserError(`testctrl ${option} takes no options`);
    return null;
  }
  const [arg] = args;
  if (args.length !== 1 || arg === undefined) {
    throw new UserError(
      kind === "unsigned"
        ? `testctrl ${option} takes a single unsigned int option`
        : `testctrl ${option} takes a single int option`,
    );
  }
  if (kind === "unsigned") return integerValue(arg) >>> 0;
  return kind === "int" ? atoi(arg) : integerValue(arg);
}

export const testctrlCommand = defineDotCommand({
  name: "testctrl",
  minPrefix: 8,
  args: { min: 1 },
  usage: ".testctrl NAME ?ARG?",
  describe: "Run an engine test control by name or number",
  handler: async ([option, ...rest], { session }) => {
    const db = await openDb(session);
    const code = resolveTestControl(option);
    if (code < FIRST_CONTROL || code > LAST_CONTROL) {
      throw new UserError(`invalid testctrl option: ${option}`);
    }
    const control = CONTROLS.find((c) => c.code === code);
    const arg = controlArgument(control, option, rest);
    const rc = await db.testControl(code, arg === null ? [] : [arg]);
    session.out.write(`${rc} (0x${(rc >>> 0).toString(16).padStart(8, "0")})\n`);
  },
});
