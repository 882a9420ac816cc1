/**
 * DOB Violations Source
 *
 * Re-exports and auto-registration.
 */

export * from "./constants";
export { DobViolationsAdapter, createDobViolationsAdapter } from "./adapter";

// Auto-register the adapter
import { registerComplianceSource } from "../../registry";
import { createDobViolationsAdapter } from "./adapter";
import { DOB_VIOLATIONS_SOURCE_KEY } from "./constants";

registerComplianceSource(DOB_VIOLATIONS_SOURCE_KEY, createDobViolationsAdapter);
