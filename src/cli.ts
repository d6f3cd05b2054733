import { parseArgs } from "node:util";

export type RunMode = "send" | "preview";

export type CliOptions =
  | { readonly ok: true; readonly mode: RunMode; readonly configPath: string | undefined }
  | { readonly ok: false; readonly error: string | null };

export const USAGE = [
  "Usage: daily-brief [--once | --test] [--config <path>]",
  "  --once: Run the full newsletter pipeline and send the email.",
  "  --test: Run the pipeline but print a preview instead of sending an email.",
  "  --config: Optional YAML settings file (defaults to $CONFIG_PATH).",
].join("\n");

/**
 * Parses the command line. `--once` wins over `--test` when both are given.
 */
export function parseCli(argv: ReadonlyArray<string>): CliOptions {
  let values: { once?: boolean; test?: boolean; config?: string };
  try {
    ({ values } = parseArgs({
      args: [...argv],
      options: {
        once: { type: "boolean" },
        test: { type: "boolean" },
        config: { type: "string" },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }

  if (values.once) {
    return { ok: true, mode: "send", configPath: values.config };
  }
  if (values.test) {
    return { ok: true, mode: "preview", configPath: values.config };
  }
  return { ok: false, error: null };
}
