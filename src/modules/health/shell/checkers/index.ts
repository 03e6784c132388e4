export { makeTableHealthChecker, type TableHealthCheckerOptions } from './table-checker.js';
