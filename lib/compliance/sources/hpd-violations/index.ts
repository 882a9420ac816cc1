/**
 * HPD Violations Source
 *
 * Re-exports and auto-registration.
 */

export * from "./constants";
export { HpdViolationsAdapter, createHpdViolationsAdapter } from "./adapter";

// Auto-register the adapter
import { registerComplianceSource } from "../../registry";
import { createHpdViolationsAdapter } from "./adapter";
import { HPD_VIOLATIONS_SOURCE_KEY } from "./constants";

registerComplianceSource(HPD_VIOLATIONS_SOURCE_KEY, createHpdViolationsAdapter);
