// ─── Tunnedit: Environment Helpers ───────────────────────────────────────────

/** `1`, `true` and `yes` (any case) switch a flag on; anything else leaves it off. */
export function envFlag(value: string | undefined): boolean {
    return value !== undefined && /^(1|true|yes)$/i.test(value.trim());
}

/** A positive integer from the environment, or `fallback` when unset or invalid. */
export function envInt(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;
    const parsed = parseInt(value, 10);
    return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : fallback;
}
