export type DebugFlag = "parser" | "codec" | "conn" | "server";

/**
 * Debug configuration
 *
 * - `true`: enable all debug components
 * - `false`: disable all debug components
 * - list: enable only the named components
 */
export type DebugConfig = boolean | DebugFlag[];

export const ALL_DEBUG_FLAGS: readonly DebugFlag[] = ["parser", "codec", "conn", "server"];

function isDebugFlag(value: string): value is DebugFlag {
  return ALL_DEBUG_FLAGS.some((flag) => flag === value);
}

export function parseDebugEnv(value: string | undefined = process.env.H1_DEBUG) {
  const flags = new Set<DebugFlag>();
  if (!value) return flags;
  for (const entry of value.split(",")) {
    const flag = entry.trim().toLowerCase();
    if (!flag) continue;
    if (flag === "*" || flag === "all") {
      for (const known of ALL_DEBUG_FLAGS) flags.add(known);
      continue;
    }
    if (isDebugFlag(flag)) flags.add(flag);
  }
  return flags;
}

/** Explicit configuration wins over the environment */
export function resolveDebugFlags(
  config: DebugConfig | undefined,
  envFlags: Set<DebugFlag> = parseDebugEnv(),
): Set<DebugFlag> {
  if (config === undefined) return new Set(envFlags);
  if (config === true) return new Set(ALL_DEBUG_FLAGS);
  if (config === false) return new Set();
  return new Set(config);
}

export function debugFlagsToArray(flags: Set<DebugFlag>): DebugFlag[] {
  return ALL_DEBUG_FLAGS.filter((flag) => flags.has(flag));
}

export function stripTrailingNewline(message: string) {
  return message.endsWith("\n") ? message.slice(0, -1) : message;
}
