export { ResourceRegistry } from './resource-registry.js';
export { ToolRegistry } from './tool-registry.js';
