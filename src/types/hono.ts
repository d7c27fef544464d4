/**
 * Hono Type Extensions
 *
 * Custom types for Hono context variables
 */

import type { AdmissionDecision } from '@/services/admission.service';

export type HonoEnv = {
  Variables: {
    /** Set by accountResolver from the gateway-injected header */
    accountId?: string;
    /** Set by admissionControl once a request is admitted */
    admission?: AdmissionDecision;
  };
};
