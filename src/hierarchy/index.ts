export { parseHierarchy, loadHierarchy, summarizeHierarchy } from './descriptor.js';
