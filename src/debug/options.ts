export interface CdpMuxDebugOptions {
  /** Log every inbound and outbound protocol frame. */
  cdpFrames?: boolean;
  /** Log each step of the close cascade. */
  closeCascade?: boolean;
}

type DebugFlag = keyof CdpMuxDebugOptions;

const DEBUG_FLAGS: DebugFlag[] = ["cdpFrames", "closeCascade"];

let currentDebugOptions: CdpMuxDebugOptions & { enabled?: boolean } = {};

function readBooleanFlag(
  options: CdpMuxDebugOptions,
  flag: DebugFlag
): boolean | undefined {
  try {
    const value: unknown = options[flag];
    return typeof value === "boolean" ? value : undefined;
  } catch {
    return undefined;
  }
}

export function setDebugOptions(
  options?: CdpMuxDebugOptions,
  enabled: boolean = true
): void {
  const next: CdpMuxDebugOptions & { enabled?: boolean } = {};
  if (options) {
    for (const flag of DEBUG_FLAGS) {
      const value = readBooleanFlag(options, flag);
      if (value !== undefined) {
        next[flag] = value;
      }
    }
  }
  next.enabled = enabled;
  currentDebugOptions = next;
}

export function getDebugOptions(): CdpMuxDebugOptions & { enabled?: boolean } {
  return currentDebugOptions;
}

let envDebugCache: { raw: string; flags: Set<string> } | null = null;

function envDebugFlags(): Set<string> {
  const raw = process.env.CDP_MUX_DEBUG ?? "";
  if (envDebugCache === null || envDebugCache.raw !== raw) {
    envDebugCache = {
      raw,
      flags: new Set(
        raw
          .split(",")
          .map((entry) => entry.trim())
          .filter((entry) => entry.length > 0)
      ),
    };
  }
  return envDebugCache.flags;
}

/**
 * Explicit options win; otherwise `CDP_MUX_DEBUG=cdpFrames,closeCascade`
 * (or `CDP_MUX_DEBUG=*`) turns tracing on.
 */
export function isDebugEnabled(flag: DebugFlag): boolean {
  const opts = getDebugOptions();
  if (opts.enabled && typeof opts[flag] === "boolean") {
    return opts[flag] === true;
  }
  const fromEnv = envDebugFlags();
  return fromEnv.has("*") || fromEnv.has(flag);
}

/**
 * Applies the debug settings passed when connecting. `debugOptions` turns
 * tracing on for the flags it names; `debug` alone turns every flag on.
 * With neither, the current settings are left as they are.
 */
export function applyDebugSettings(
  debug: boolean,
  options?: CdpMuxDebugOptions
): void {
  if (options) {
    setDebugOptions(options, true);
    return;
  }
  if (debug) {
    setDebugOptions({ cdpFrames: true, closeCascade: true }, true);
  }
}
