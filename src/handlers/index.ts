export { registerBuiltinHandlers } from './builtin.js';
