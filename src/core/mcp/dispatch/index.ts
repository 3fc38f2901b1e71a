export { MCPToolDispatcher, type DispatchedTool, type ToolDispatcherOptions } from './tool-dispatcher.js';
