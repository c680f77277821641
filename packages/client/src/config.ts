// ─── Tunnedit Client: Configuration ──────────────────────────────────────────

import { DEFAULT_MAX_BODY_SIZE, envFlag, envInt, type UpdateMode } from '@tunnedit/shared';

export function parseUpdateMode(value: string | undefined): UpdateMode {
    return value?.trim().toLowerCase() === 'full' ? 'full' : 'differential';
}

export const config = {
    debug: envFlag(process.env.TUNNEDIT_DEBUG),
    updateMode: parseUpdateMode(process.env.TUNNEDIT_UPDATE_MODE),
    maxBodySize: envInt(process.env.TUNNEDIT_MAX_BODY, DEFAULT_MAX_BODY_SIZE),
};
