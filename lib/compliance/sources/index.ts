/**
 * Feed Sources
 *
 * Importing this module registers every built-in source.
 * Explicit exports to avoid naming conflicts (e.g., PARSER_VERSION)
 */

export * from "./socrata";

export {
  HPD_VIOLATIONS_SOURCE_KEY,
  HPD_VIOLATIONS_CONFIG,
  PARSER_VERSION as HPD_VIOLATIONS_PARSER_VERSION,
  HpdViolationsAdapter,
  createHpdViolationsAdapter,
} from "./hpd-violations";

export {
  DOB_VIOLATIONS_SOURCE_KEY,
  DOB_VIOLATIONS_CONFIG,
  PARSER_VERSION as DOB_VIOLATIONS_PARSER_VERSION,
  DobViolationsAdapter,
  createDobViolationsAdapter,
} from "./dob-violations";

export {
  COMPLAINTS_311_SOURCE_KEY,
  COMPLAINTS_311_CONFIG,
  PARSER_VERSION as COMPLAINTS_311_PARSER_VERSION,
  Complaints311Adapter,
  createComplaints311Adapter,
} from "./complaints-311";
