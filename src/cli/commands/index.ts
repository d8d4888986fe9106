export { createServeCommand } from "./serve.js";
export { createSessionsCommand } from "./sessions.js";
export { createCleanupCommand } from "./cleanup.js";
export { createSendTestWebhookCommand } from "./send-test-webhook.js";
export { createMcpCommand } from "./mcp.js";
export { createConfigCommand } from "./config.js";
