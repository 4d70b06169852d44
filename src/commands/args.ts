import { ConfigError } from "../errors";

export interface ParsedArgs {
    command: string | undefined;
    flags: Map<string, string | true>;
}

/** Flags that never take a value */
const BOOLEAN_FLAGS = new Set(["--zero-fill", "--timing", "-t", "--help", "-h", "--json"]);

/**
 * Split argv (without node and script) into a command and its flags.
 * "--name value" pairs become string flags, boolean flags become true.
 */
export function parseArgs(argv: string[]): ParsedArgs {
    // Filter out standalone "--" which npm passes through
    const args = argv.filter(a => a !== "--");
    const flags = new Map<string, string | true>();
    let command: string | undefined;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === undefined) continue;
        const nextArg = args[i + 1];

        if (arg.startsWith("-")) {
            if (BOOLEAN_FLAGS.has(arg) || nextArg === undefined || nextArg.startsWith("--")) {
                flags.set(arg, true);
            } else {
                flags.set(arg, nextArg);
                i++;
            }
        } else if (command === undefined) {
            command = arg;
        }
    }

    return { command, flags };
}

/**
 * String value of the first matching flag
 */
export function getString(flags: Map<string, string | true>, ...names: string[]): string | undefined {
    for (const name of names) {
        const value = flags.get(name);
        if (typeof value === "string") return value;
    }
    return undefined;
}

/**
 * Integer value of a flag; throws ConfigError on a non-integer
 */
export function getInt(flags: Map<string, string | true>, ...names: string[]): number | undefined {
    const value = getString(flags, ...names);
    if (value === undefined) return undefined;
    const n = parseInt(value, 10);
    if (!Number.isFinite(n) || String(n) !== value.trim()) {
        throw new ConfigError(`${names[0] ?? "option"} expects an integer, got "${value}"`);
    }
    return n;
}

export function hasFlag(flags: Map<string, string | true>, ...names: string[]): boolean {
    return names.some(name => flags.has(name));
}
