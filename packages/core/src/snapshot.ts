import { ConversationTools } from "./tools.js";
import type { Logger } from "./logger.js";

export async function loadSnapshot(configPath?: string, logger?: Logger): Promise<ConversationTools> {
  const tools = await ConversationTools.fromConfigPath(configPath, logger ? { logger } : {});
  await tools.getCache().refresh();
  return tools;
}
