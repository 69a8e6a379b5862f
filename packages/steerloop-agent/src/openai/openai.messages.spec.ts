import OpenAI from 'openai';
import { Message, MessageContentType, Role } from '@steerloop/shared';
import { computerCall, functionCall, text } from '../testing/fakes';
import {
  formatMessagesForOpenAI,
  formatOpenAIResponse,
  fromOpenAIComputerAction,
  staleScreenshotNotice,
  toOpenAIComputerAction,
} from './openai.messages';

const image = (data: string) => ({
  type: MessageContentType.Image as const,
  source: { media_type: 'image/png' as const, type: 'base64' as const, data },
});

const click = computerCall('c1', {
  action: 'click',
  coordinates: { x: 1, y: 2 },
  button: 'left',
});

describe('formatMessagesForOpenAI', () => {
  it('converts a full exchange into input items', () => {
    const messages: Message[] = [
      { role: Role.User, content: [text('Open example')] },
      {
        role: Role.Assistant,
        content: [
          {
            type: MessageContentType.Reasoning,
            id: 'rs_1',
            summary: ['thinking'],
            encryptedContent: 'enc',
          },
          click,
          functionCall('c2', 'goto', { url: 'https://example.com' }),
        ],
      },
      {
        role: Role.User,
        content: [
          {
            type: MessageContentType.ToolResult,
            tool_use_id: 'c1',
            toolKind: 'computer',
            content: [image('AAAA')],
            acknowledgedSafetyChecks: [],
            currentUrl: 'https://example.com/',
          },
          {
            type: MessageContentType.ToolResult,
            tool_use_id: 'c2',
            toolKind: 'function',
            content: [text('navigated')],
          },
        ],
      },
    ];

    expect(formatMessagesForOpenAI(messages)).toEqual([
      { type: 'message', role: 'user', content: 'Open example' },
      {
        type: 'reasoning',
        id: 'rs_1',
        summary: [{ type: 'summary_text', text: 'thinking' }],
        encrypted_content: 'enc',
      },
      {
        type: 'computer_call',
        id: 'cu_c1',
        call_id: 'c1',
        action: { type: 'click', x: 1, y: 2, button: 'left' },
        pending_safety_checks: [],
        status: 'completed',
      },
      {
        type: 'function_call',
        call_id: 'c2',
        name: 'goto',
        arguments: '{"url":"https://example.com"}',
      },
      {
        type: 'computer_call_output',
        call_id: 'c1',
        output: {
          type: 'computer_screenshot',
          image_url: 'data:image/png;base64,AAAA',
          current_url: 'https://example.com/',
        },
        acknowledged_safety_checks: [],
      },
      { type: 'function_call_output', call_id: 'c2', output: 'navigated' },
    ]);
  });

  it('answers failed computer calls with the latest screenshot and the error', () => {
    const messages: Message[] = [
      { role: Role.Assistant, content: [click] },
      {
        role: Role.User,
        content: [
          {
            type: MessageContentType.ToolResult,
            tool_use_id: 'c1',
            toolKind: 'computer',
            content: [image('AAAA')],
          },
        ],
      },
      {
        role: Role.Assistant,
        content: [computerCall('c2', { action: 'keypress', keys: ['enter'] })],
      },
      {
        role: Role.User,
        content: [
          {
            type: MessageContentType.ToolResult,
            tool_use_id: 'c2',
            toolKind: 'computer',
            content: [text('ERROR [ExecutionTargetError]: offline')],
            is_error: true,
          },
        ],
      },
    ];

    const items = formatMessagesForOpenAI(messages);

    expect(items.slice(2)).toEqual([
      {
        type: 'computer_call',
        id: 'cu_c2',
        call_id: 'c2',
        action: { type: 'keypress', keys: ['enter'] },
        pending_safety_checks: [],
        status: 'completed',
      },
      {
        type: 'computer_call_output',
        call_id: 'c2',
        output: {
          type: 'computer_screenshot',
          image_url: 'data:image/png;base64,AAAA',
        },
        acknowledged_safety_checks: [],
      },
      {
        type: 'message',
        role: 'user',
        content: 'ERROR [ExecutionTargetError]: offline',
      },
      {
        type: 'message',
        role: 'user',
        content:
          'No screenshot was taken after computer action c2; the attached screenshot is from before it ran and may not show its effect.',
      },
    ]);
  });

  it('labels a reused screenshot when the action took none of its own', () => {
    const messages: Message[] = [
      { role: Role.Assistant, content: [click] },
      {
        role: Role.User,
        content: [
          {
            type: MessageContentType.ToolResult,
            tool_use_id: 'c1',
            toolKind: 'computer',
            content: [image('BBBB')],
          },
        ],
      },
      {
        role: Role.Assistant,
        content: [computerCall('c2', { action: 'type', text: 'hello' })],
      },
      {
        role: Role.User,
        content: [
          {
            type: MessageContentType.ToolResult,
            tool_use_id: 'c2',
            toolKind: 'computer',
            content: [],
          },
        ],
      },
    ];

    const items = formatMessagesForOpenAI(messages);

    expect(items.slice(1, 2)).toEqual([
      {
        type: 'computer_call_output',
        call_id: 'c1',
        output: {
          type: 'computer_screenshot',
          image_url: 'data:image/png;base64,BBBB',
        },
        acknowledged_safety_checks: [],
      },
    ]);
    expect(items.slice(3)).toEqual([
      {
        type: 'computer_call_output',
        call_id: 'c2',
        output: {
          type: 'computer_screenshot',
          image_url: 'data:image/png;base64,BBBB',
        },
        acknowledged_safety_checks: [],
      },
      {
        type: 'message',
        role: 'user',
        content: staleScreenshotNotice('c2'),
      },
    ]);
  });

  it('renders computer calls without any screenshot as text', () => {
    const messages: Message[] = [
      { role: Role.Assistant, content: [click] },
      {
        role: Role.User,
        content: [
          {
            type: MessageContentType.ToolResult,
            tool_use_id: 'c1',
            toolKind: 'computer',
            content: [],
          },
        ],
      },
    ];

    expect(formatMessagesForOpenAI(messages)).toEqual([
      {
        type: 'message',
        role: 'user',
        content: 'Result of computer action c1: done',
      },
    ]);
  });

  it('drops reasoning without encrypted content and unsupported calls', () => {
    const messages: Message[] = [
      {
        role: Role.Assistant,
        content: [
          { type: MessageContentType.Reasoning, id: 'rs_2', summary: [] },
          computerCall('c3', { action: 'unsupported', requested: 'zoom' }),
          text('Cannot zoom'),
        ],
      },
    ];

    expect(formatMessagesForOpenAI(messages)).toEqual([
      { type: 'message', role: 'assistant', content: 'Cannot zoom' },
    ]);
  });

  it('sends images returned by functions as a user message', () => {
    const messages: Message[] = [
      {
        role: Role.User,
        content: [
          {
            type: MessageContentType.ToolResult,
            tool_use_id: 'c4',
            toolKind: 'function',
            content: [text('{"engine":"bing"}'), image('BBBB')],
          },
        ],
      },
    ];

    expect(formatMessagesForOpenAI(messages)).toEqual([
      {
        type: 'function_call_output',
        call_id: 'c4',
        output: '{"engine":"bing"}',
      },
      {
        type: 'message',
        role: 'user',
        content: [
          {
            type: 'input_image',
            detail: 'auto',
            image_url: 'data:image/png;base64,BBBB',
          },
        ],
      },
    ]);
  });
});

describe('formatOpenAIResponse', () => {
  it('converts output items into content blocks', () => {
    const message: OpenAI.Responses.ResponseOutputMessage = {
      id: 'msg_1',
      type: 'message',
      role: 'assistant',
      status: 'completed',
      content: [
        { type: 'output_text', text: 'Clicking', annotations: [] },
        { type: 'refusal', refusal: 'Not that' },
      ],
    };
    const call: OpenAI.Responses.ResponseComputerToolCall = {
      id: 'cu_1',
      type: 'computer_call',
      call_id: 'c1',
      action: { type: 'double_click', x: 3, y: 4 },
      pending_safety_checks: [
        { id: 'sc_1', code: 'sensitive_domain', message: 'Check the domain' },
      ],
      status: 'completed',
    };
    const fn: OpenAI.Responses.ResponseFunctionToolCall = {
      type: 'function_call',
      call_id: 'c2',
      name: 'resilient_search',
      arguments: '{"query":"cats"}',
    };
    const reasoning: OpenAI.Responses.ResponseReasoningItem = {
      id: 'rs_1',
      type: 'reasoning',
      summary: [{ type: 'summary_text', text: 'Plan' }],
      encrypted_content: 'enc',
    };

    expect(formatOpenAIResponse([message, call, fn, reasoning])).toEqual([
      { type: MessageContentType.Text, text: 'Clicking' },
      { type: MessageContentType.Text, text: 'Refusal: Not that' },
      {
        type: MessageContentType.ComputerCall,
        id: 'cu_1',
        callId: 'c1',
        action: { action: 'double_click', coordinates: { x: 3, y: 4 } },
        pendingSafetyChecks: [
          { id: 'sc_1', code: 'sensitive_domain', message: 'Check the domain' },
        ],
      },
      {
        type: MessageContentType.FunctionCall,
        callId: 'c2',
        name: 'resilient_search',
        arguments: { query: 'cats' },
        rawArguments: '{"query":"cats"}',
      },
      {
        type: MessageContentType.Reasoning,
        id: 'rs_1',
        summary: ['Plan'],
        encryptedContent: 'enc',
      },
    ]);
  });

  it('keeps malformed function arguments as an empty object', () => {
    const fn: OpenAI.Responses.ResponseFunctionToolCall = {
      type: 'function_call',
      call_id: 'c2',
      name: 'goto',
      arguments: '{not json',
    };

    expect(formatOpenAIResponse([fn])).toEqual([
      {
        type: MessageContentType.FunctionCall,
        callId: 'c2',
        name: 'goto',
        arguments: {},
        rawArguments: '{not json',
      },
    ]);
  });
});

describe('computer action conversion', () => {
  it('maps provider actions onto agent actions and back', () => {
    expect(
      fromOpenAIComputerAction({
        type: 'scroll',
        x: 5,
        y: 6,
        scroll_x: 0,
        scroll_y: 400,
      }),
    ).toEqual({
      action: 'scroll',
      coordinates: { x: 5, y: 6 },
      scrollX: 0,
      scrollY: 400,
    });
    expect(fromOpenAIComputerAction({ type: 'wait' })).toEqual({
      action: 'wait',
    });
    expect(
      toOpenAIComputerAction({ action: 'type', text: 'hello' }),
    ).toEqual({ type: 'type', text: 'hello' });
  });
});
