// Provider-neutral message and request types

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ImageSource =
  | { type: 'base64'; data: string }
  | { type: 'url'; url: string };

export interface ImageData {
  source: ImageSource;
  mediaType: string;
}

export type ToolResultContent =
  | { type: 'text'; text: string }
  | { type: 'json'; value: JsonValue }
  | { type: 'image'; image: ImageData };

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ThinkingBlock {
  type: 'thinking';
  thinking: string;
}

export interface ImageBlock {
  type: 'image';
  image: ImageData;
}

/** Assistant only */
export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: JsonValue;
}

/** User only. `toolUseId` must name a tool_use kept in the same request. */
export interface ToolResultBlock {
  type: 'tool_result';
  toolUseId: string;
  content: ToolResultContent;
  isError: boolean;
}

export type ContentBlock = TextBlock | ThinkingBlock | ImageBlock | ToolUseBlock | ToolResultBlock;

export type MessageRole = 'user' | 'assistant';

export interface Message {
  role: MessageRole;
  content: ContentBlock[];
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: JsonValue;
}

/**
 * A bounded, ready-to-send request
 */
export interface LLMRequest {
  model: string;
  system: string;
  messages: Message[];
  tools: ToolDefinition[];
  maxTokens: number;
  stream: true;
}

export function textMessage(role: MessageRole, text: string): Message {
  return { role, content: [{ type: 'text', text }] };
}

export function userMessage(text: string): Message {
  return textMessage('user', text);
}

export function assistantMessage(text: string): Message {
  return textMessage('assistant', text);
}

export function toolUseMessage(id: string, name: string, input: JsonValue, text?: string): Message {
  const content: ContentBlock[] = [];
  if (text) content.push({ type: 'text', text });
  content.push({ type: 'tool_use', id, name, input });
  return { role: 'assistant', content };
}

export function toolResultMessage(toolUseId: string, output: string | JsonValue, isError: boolean = false): Message {
  const content: ToolResultContent = typeof output === 'string'
    ? { type: 'text', text: output }
    : { type: 'json', value: output };
  return { role: 'user', content: [{ type: 'tool_result', toolUseId, content, isError }] };
}

export function isToolUse(block: ContentBlock): block is ToolUseBlock {
  return block.type === 'tool_use';
}

export function isToolResult(block: ContentBlock): block is ToolResultBlock {
  return block.type === 'tool_result';
}

/**
 * Concatenated text blocks, for display
 */
export function messageText(message: Message): string {
  return message.content
    .map(block => (block.type === 'text' ? block.text : ''))
    .join('');
}
