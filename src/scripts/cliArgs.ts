export type CliArgs = {
  configPath?: string;
  inputPath?: string;
};

const FLAGS = new Map<string, keyof CliArgs>([
  ["--config", "configPath"],
  ["-c", "configPath"],
  ["--input", "inputPath"],
  ["-i", "inputPath"],
]);

/** Accepts `--flag value` and `--flag=value`. A flag without a value is an error. */
export function parseCliArgs(argv: string[]): CliArgs {
  const parsed: CliArgs = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf("=");
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const key = FLAGS.get(flag);
    if (!key) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    let value: string | undefined;
    if (eq > 0) {
      value = arg.slice(eq + 1);
    } else {
      i += 1;
      value = argv[i];
    }
    if (value === undefined || value.trim() === "" || (eq < 0 && value.startsWith("-"))) {
      throw new Error(`Missing value for ${flag}`);
    }
    parsed[key] = value;
  }
  return parsed;
}
