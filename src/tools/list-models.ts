/**
 * list_anki_models Tool
 */

import { type Tool } from '@modelcontextprotocol/sdk/types.js';
import { type ToolError } from '../lib/types.js';
import { type ToolContext, toolError } from './context.js';

export const listModelsTool: Tool = {
  name: 'list_anki_models',
  description: 'List all available Anki note types (models).',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

export interface ListModelsSuccess {
  models: string[];
  model_count: number;
  message: string;
}

export async function listModels({ client, logger }: ToolContext): Promise<ListModelsSuccess | ToolError> {
  try {
    const models = await client.modelNames();

    return {
      models,
      model_count: models.length,
      message: `Found ${models.length} available note types/models`,
    };
  } catch (error) {
    logger.error(
      `Error occurred while retrieving Anki models: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
    return toolError(error, 'Unknown error occurred while retrieving models');
  }
}

export async function handleListModels(context: ToolContext): Promise<string> {
  return JSON.stringify(await listModels(context));
}
