import prompts from "prompts";
import ora from "ora";

/**
 * Confirmation prompt. Returns `false` if the user declines or cancels.
 *
 * Pass `opts.force` to skip the prompt and return `true` immediately.
 * Off a terminal there is nobody to ask, so the caller's explicit flags
 * stand as the confirmation.
 */
export async function confirm(
  message: string,
  opts?: { force?: boolean },
): Promise<boolean> {
  if (opts?.force || !process.stdin.isTTY) return true;
  const { confirmed } = await prompts({
    type: "confirm",
    name: "confirmed",
    message,
    initial: false,
  });
  return confirmed === true;
}

/** Creates an ora spinner. Automatically silenced in non-TTY environments. */
export function spinner(text: string) {
  return ora({ text, isSilent: !process.stderr.isTTY });
}
