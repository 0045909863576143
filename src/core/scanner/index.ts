export { TreeScanner } from './tree-scanner.js';
export type { TreeScannerOptions, ScanOptions } from './tree-scanner.js';
