import OpenAI from 'openai';
import { Dimensions, Environment } from '@steerloop/shared';
import { ToolDeclaration } from '../agent/agent.types';

/**
 * Converts an agent tool declaration to an OpenAI.Responses.FunctionTool
 */
export function agentToolToOpenAITool(
  agentTool: ToolDeclaration,
): OpenAI.Responses.FunctionTool {
  return {
    type: 'function',
    name: agentTool.name,
    description: agentTool.description,
    parameters: agentTool.parameters,
    // Optional arguments are left out by the model instead of sent as null
    strict: false,
  };
}

export function computerUseTool(
  environment: Environment,
  display: Dimensions,
): OpenAI.Responses.ComputerTool {
  return {
    type: 'computer_use_preview',
    environment,
    display_width: display.width,
    display_height: display.height,
  };
}

export function buildOpenAITools(
  tools: readonly ToolDeclaration[],
  environment: Environment,
  display: Dimensions,
): OpenAI.Responses.Tool[] {
  return [
    computerUseTool(environment, display),
    ...tools.map(agentToolToOpenAITool),
  ];
}
