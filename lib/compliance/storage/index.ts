/**
 * Storage Module
 */

export * from "./compliance-repository";
