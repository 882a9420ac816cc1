/**
 * 311 Complaints Source
 *
 * Re-exports and auto-registration.
 */

export * from "./constants";
export { Complaints311Adapter, createComplaints311Adapter } from "./adapter";

// Auto-register the adapter
import { registerComplianceSource } from "../../registry";
import { createComplaints311Adapter } from "./adapter";
import { COMPLAINTS_311_SOURCE_KEY } from "./constants";

registerComplianceSource(COMPLAINTS_311_SOURCE_KEY, createComplaints311Adapter);
