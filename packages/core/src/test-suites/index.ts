/**
 * Parametrized test suites for datastore implementations
 */

export * from "./datastore.suite.js";
