import ora from "ora";

/** Creates an ora spinner. Automatically silenced in non-TTY environments. */
export function spinner(text: string) {
  return ora({ text, isSilent: !process.stderr.isTTY });
}
