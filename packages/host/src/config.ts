// ─── Tunnedit Host: Configuration ────────────────────────────────────────────

import { DEFAULT_MAX_BODY_SIZE, envFlag, envInt } from '@tunnedit/shared';
import { detectShell } from './shellExport';

export const config = {
    debug: envFlag(process.env.TUNNEDIT_DEBUG),
    maxBodySize: envInt(process.env.TUNNEDIT_MAX_BODY, DEFAULT_MAX_BODY_SIZE),
    shell: detectShell(process.env),
};
