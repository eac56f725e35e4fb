/**
 * Intent Handlers Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';

import { SPECIALIST_TERMS } from '@/config/vocabulary.js';
import { createIntentHandlers, detectSpecialistDomain } from '@/orchestrator/handlers.js';
import { INTENT_INSTRUCTIONS } from '@/orchestrator/prompt-builder.js';
import { EMPTY_CONTEXT, INTENTS } from '@/types/index.js';
import type { HandlerRegistry, HandlerRequest, TextGenerator, User } from '@/types/index.js';

import { adminUser, guestUser, operationsUser, ownerUser } from '../../fixtures/index.js';

function request(query: string, user: User = adminUser): HandlerRequest {
  return {
    query,
    user,
    requestedIntent: 'domain_specialist',
    accessDenied: false,
    history: [],
    memories: { facts: [], preferences: {}, insights: {} },
    profile: null,
  };
}

describe('detectSpecialistDomain', () => {
  it('should return the first domain in domain order', () => {
    // "chef" is both a cuisine and a staffing term; cuisine comes first
    expect(detectSpecialistDomain('hiring a head chef', SPECIALIST_TERMS)).toBe('cuisine');
  });

  it('should not match short terms inside words', () => {
    expect(detectSpecialistDomain('walk me through hiring', SPECIALIST_TERMS)).toBe('staffing');
    expect(detectSpecialistDomain('walk me through it', SPECIALIST_TERMS)).toBeNull();
  });

  it('should match stems', () => {
    expect(detectSpecialistDomain('advertising ideas', SPECIALIST_TERMS)).toBe('marketing');
  });
});

describe('Intent handlers', () => {
  let generate: Mock<TextGenerator['generate']>;
  let handlers: HandlerRegistry;

  beforeEach(() => {
    generate = vi.fn<TextGenerator['generate']>().mockResolvedValue('generated answer');
    handlers = createIntentHandlers({
      generator: { generate },
      permissionService: {
        canAccessDomain: (role, domain) =>
          role === 'admin' || (role === 'operations' && domain === 'staffing'),
      },
      specialistTerms: SPECIALIST_TERMS,
    });
  });

  it('should register a handler for every intent', () => {
    expect(Object.keys(handlers).sort()).toEqual([...INTENTS].sort());
  });

  it('should send the intent instructions to the generator', async () => {
    const reply = await handlers.regulatory_advisor.handle(
      { city: 'Pune' },
      EMPTY_CONTEXT,
      request('What licences do I need?')
    );

    expect(reply).toBe('generated answer');
    const messages = generate.mock.calls[0]![0];
    expect(messages[0]?.content).toContain(`## TASK\n${INTENT_INSTRUCTIONS.regulatory_advisor}`);
    expect(messages.at(-1)).toEqual({
      role: 'user',
      content: 'What licences do I need?\n\nDetails: city=Pune',
    });
  });

  it('should tolerate missing parameters', async () => {
    await expect(
      handlers.location_recommender.handle({}, EMPTY_CONTEXT, request('Where?'))
    ).resolves.toBe('generated answer');
  });

  describe('domain specialist', () => {
    it('should prefix the detected domain', async () => {
      const reply = await handlers.domain_specialist.handle(
        {},
        EMPTY_CONTEXT,
        request('How should I structure my staff rota?')
      );

      expect(reply).toBe('[STAFFING SPECIALIST RESPONSE]\n\ngenerated answer');
      const system = generate.mock.calls[0]![0][0]?.content ?? '';
      expect(system).toContain('You are a restaurant staffing specialist.');
    });

    it('should honor a role granted a single domain', async () => {
      const reply = await handlers.domain_specialist.handle(
        {},
        EMPTY_CONTEXT,
        request('Hiring tips?', operationsUser)
      );

      expect(reply).toBe('[STAFFING SPECIALIST RESPONSE]\n\ngenerated answer');
    });

    it('should fall back to general guidance when the domain is denied', async () => {
      const reply = await handlers.domain_specialist.handle(
        {},
        EMPTY_CONTEXT,
        request('What interior design suits a cafe?', ownerUser)
      );

      expect(reply).toBe(
        'Note: Design specialist advice is not available for your role, so here is general guidance.\n\ngenerated answer'
      );
      const system = generate.mock.calls[0]![0][0]?.content ?? '';
      expect(system).toContain(`## TASK\n${INTENT_INSTRUCTIONS.basic_query}`);
    });

    it('should answer generically when no domain is detected', async () => {
      const reply = await handlers.domain_specialist.handle(
        {},
        EMPTY_CONTEXT,
        request('Tell me something useful', guestUser)
      );

      expect(reply).toBe('generated answer');
      const system = generate.mock.calls[0]![0][0]?.content ?? '';
      expect(system).toContain(`## TASK\n${INTENT_INSTRUCTIONS.domain_specialist}`);
    });
  });

  it('should propagate generator failures', async () => {
    generate.mockRejectedValue(new Error('model offline'));

    await expect(
      handlers.basic_query.handle({}, EMPTY_CONTEXT, request('hello'))
    ).rejects.toThrow('model offline');
  });
});
