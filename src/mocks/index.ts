/**
 * Export all mock implementations for easy importing in tests
 */

export { MockBookAnalyzer } from "./book-analyzer";
