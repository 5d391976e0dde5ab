export type { ToolProvider } from './tool-provider.js';
export { ProviderTimeoutError, withTimeout } from './timeout.js';
export { createMcpToolProvider, createStdioTransport, mapCallToolResult } from './mcp-provider.js';
export type { McpToolProviderOptions } from './mcp-provider.js';
export { connectToolProviders, providerTool } from './bridge.js';
export type { ConnectOptions, ConnectedProviders, ProviderFailure, ToolProviderFactory } from './bridge.js';
