/**
 * Parses a base-10 integer from an env var, using `fallback` when the value is empty.
 */
export function parseEnvInt(value: string | undefined, fallback: number): number {
    const source =
        typeof value === "string" && value.length > 0
            ? value
            : String(fallback);
    return Number.parseInt(source, 10);
}

/**
 * Parses a decimal number from an env var, using `fallback` when the value is empty.
 */
export function parseEnvFloat(value: string | undefined, fallback: number): number {
    const source =
        typeof value === "string" && value.trim().length > 0
            ? value
            : String(fallback);
    return Number.parseFloat(source);
}

export function parseEnvOptional(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}
