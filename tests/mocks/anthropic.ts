/**
 * Mock for @anthropic-ai/sdk module.
 *
 * Provides configurable mock responses for testing provider calls
 * without making real API calls.
 */

import { vi } from 'vitest';

/**
 * Text block response from Anthropic API.
 */
export interface TextBlock {
  type: 'text';
  text: string;
}

/**
 * Mock response structure matching Anthropic API response.
 */
export interface MockResponse {
  content: TextBlock[];
  stop_reason: 'end_turn' | 'max_tokens';
}

/**
 * A queued outcome: a response, an error to throw, or a call that never
 * settles until its abort signal fires.
 */
export type MockOutcome = MockResponse | Error | 'hang';

// Queue of mock outcomes to return
let mockResponses: MockOutcome[] = [];

export interface CreateCall {
  model: string;
  messages: unknown[];
  system?: string;
  max_tokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

// Call history for assertions
let createCalls: CreateCall[] = [];

/**
 * Set the mock outcomes for messages.create().
 * Outcomes are consumed in order (first one is returned first).
 * If the queue is empty, a default text response is returned.
 */
export function setMockResponses(responses: MockOutcome[]): void {
  mockResponses = [...responses];
}

/**
 * Add a single mock outcome to the queue.
 */
export function addMockResponse(response: MockOutcome): void {
  mockResponses.push(response);
}

/**
 * Create a simple text response.
 */
export function createTextResponse(text: string): MockResponse {
  return {
    content: [{ type: 'text', text }],
    stop_reason: 'end_turn',
  };
}

/**
 * An error shaped like the SDK's APIError, carrying an HTTP status.
 */
export function createStatusError(status: number, message = `Request failed with status ${status}`): Error {
  return Object.assign(new Error(message), { status });
}

/**
 * Get all calls made to messages.create() for assertions.
 */
export function getCreateCalls(): CreateCall[] {
  return [...createCalls];
}

/**
 * Clear mock state. Call this in beforeEach.
 */
export function clearMockState(): void {
  mockResponses = [];
  createCalls = [];
}

function waitForAbort(signal?: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal?.addEventListener('abort', () => {
      reject(Object.assign(new Error('Request was aborted.'), { name: 'APIUserAbortError' }));
    }, { once: true });
  });
}

// Mock the messages.create method
const mockCreate = vi.fn(async (
  params: {
    model: string;
    messages: unknown[];
    system?: string;
    max_tokens?: number;
    temperature?: number;
  },
  options?: { signal?: AbortSignal }
) => {
  createCalls.push({
    model: params.model,
    messages: params.messages,
    system: params.system,
    max_tokens: params.max_tokens,
    temperature: params.temperature,
    signal: options?.signal,
  });

  const next = mockResponses.shift();
  if (next === 'hang') {
    return waitForAbort(options?.signal);
  }
  if (next instanceof Error) {
    throw next;
  }
  if (next) {
    return next;
  }

  // Default response
  return createTextResponse('Mock response');
});

// Mock Anthropic class
class MockAnthropic {
  messages = {
    create: mockCreate,
  };

  constructor(_config?: { apiKey?: string; maxRetries?: number }) {
    // Constructor accepts config but doesn't use it in mock
  }
}

// Export as default (matches how Anthropic SDK is imported)
export default MockAnthropic;

// Also export the mock function for direct access in tests
export { mockCreate };
