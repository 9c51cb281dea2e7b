import type { Logger } from '../logger.js';
import type { HandlerContext } from './types.js';
import type { ToolCall } from '../types/index.js';

export function formatToolResult(call: ToolCall): string {
  if (call.result === undefined || call.result === null) {
    return `Tool '${call.name}' returned no results.`;
  }
  if (Array.isArray(call.result) && call.result.length === 0) {
    return `Tool '${call.name}' returned no results.`;
  }
  return `Tool '${call.name}' returned:\n${JSON.stringify(call.result, null, 2)}`;
}

export function buildHandlerPrompt(
  message: string,
  context: HandlerContext,
  calls: ToolCall[],
  task: string,
  emptyNote: string
): string {
  const toolResults = calls.length > 0 ? calls.map(formatToolResult).join('\n\n') : emptyNote;
  const recent = context.recentTurns.length > 0
    ? context.recentTurns.map(turn => `${turn.role === 'user' ? 'Customer' : 'Assistant'}: ${turn.content}`).join('\n')
    : 'None';

  return `User Query: ${message}

Known entities: ${JSON.stringify(context.entities)}

Recent conversation:
${recent}

Tool Results:
${toolResults}

${task}`;
}

/**
 * Run one store lookup as an audited tool call. A store that throws is
 * treated as returning nothing.
 */
export function runTool(
  name: string,
  args: Record<string, unknown>,
  lookup: () => unknown,
  log: Logger
): ToolCall {
  try {
    return { name, arguments: args, result: lookup() };
  } catch (err) {
    log.warn({ err, tool: name }, 'Store lookup failed');
    return { name, arguments: args, result: undefined };
  }
}

// Tools that change state run once per message, however many attempts it takes
export function runEffect(
  context: HandlerContext,
  name: string,
  args: Record<string, unknown>,
  action: () => unknown,
  log: Logger
): ToolCall {
  const perform = () => runTool(name, args, action, log);
  return context.effects ? context.effects.run(name, args, perform) : perform();
}
