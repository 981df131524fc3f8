/**
 * MCP Tool Registrars — barrel export
 */

export { registerCredentialTools } from './credentials.js';
