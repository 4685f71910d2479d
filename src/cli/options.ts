import { resolveConfigPath } from "../config/loadConfig";

export interface CliOptions {
    configPath: string;
}

export function printHelp(command: string, description: string): void {
    const lines = [
        `Usage: ${command} [--config <path-to-env>]`,
        "",
        description,
        "",
        "Options:",
        "  -c, --config   Path to the .env configuration file (defaults to .env in package root).",
        "  -h, --help     Show this help message.",
    ];
    console.log(lines.join("\n"));
}

/** Returns null when help was requested. */
export function parseArgs(argv: string[]): CliOptions | null {
    let configPath: string | undefined;

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        if (arg === "-h" || arg === "--help") {
            return null;
        }

        if (arg === "-c" || arg === "--config") {
            configPath = argv[i + 1];
            i += 1;
            continue;
        }

        if (!configPath) {
            configPath = arg;
        }
    }

    return { configPath: resolveConfigPath(configPath) };
}
