/**
 * Tool Registry
 *
 * Exports all MCP tools and their handlers.
 */

import { addCardTool, handleAddCard } from './add-card.js';
import { listDecksTool, handleListDecks } from './list-decks.js';
import { listModelsTool, handleListModels } from './list-models.js';
import { collectionInfoTool, handleCollectionInfo } from './collection-info.js';
import { checkConnectionTool, handleCheckConnection } from './check-connection.js';
import { type ToolContext } from './context.js';

export { addCardTool, handleAddCard, listDecksTool, handleListDecks, listModelsTool, handleListModels };
export { collectionInfoTool, handleCollectionInfo, checkConnectionTool, handleCheckConnection };
export type { ToolContext };

type ToolHandler = (args: unknown, context: ToolContext) => Promise<string>;

/**
 * All available tools for MCP registration
 */
export const allTools = [
  addCardTool,
  listDecksTool,
  listModelsTool,
  collectionInfoTool,
  checkConnectionTool,
];

const handlers: Record<string, ToolHandler> = {
  [addCardTool.name]: handleAddCard,
  [listDecksTool.name]: (_args, context) => handleListDecks(context),
  [listModelsTool.name]: (_args, context) => handleListModels(context),
  [collectionInfoTool.name]: (_args, context) => handleCollectionInfo(context),
  [checkConnectionTool.name]: (_args, context) => handleCheckConnection(context),
};

/**
 * Look up the handler for a tool name
 */
export function findHandler(name: string): ToolHandler | undefined {
  return Object.hasOwn(handlers, name) ? handlers[name] : undefined;
}
