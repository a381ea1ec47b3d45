export {
  toBeepPairs,
  validateEvents,
  formatJSON,
  formatJSONTracks,
  exportJSON,
  exportJSONTracks,
  type BeepPair,
  type ExportOptions,
} from './jsonExport.js';
export { formatCpp, exportCpp, type CppOptions } from './cppExport.js';
