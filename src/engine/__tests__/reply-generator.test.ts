import { describe, expect, it } from 'vitest';

import { PersonaModel } from '../persona-model';
import { PersonaRegistry } from '../personas';
import { overlapRatio } from '../text-similarity';
import { ReplyGenerator, TemplateRenderError, renderTemplate, type TemplateLibrary } from '../reply-generator';
import { createRandom } from '../../shared/random';
import { INTENTS } from '../../shared/types';
import type { PersonaSeed } from '../../shared/persona/types';
import { makeSeed } from '../../test/persona-fixtures';
import { scriptedRandom } from '../../test/scripted-random';

const library: TemplateLibrary = {
  shared: {
    statement: ['The {topic} is holding steady.', 'Nothing new about the {topic} today.'],
    question: ['What about {topic}?'],
    theory: ['Maybe {topic} is a pattern.']
  },
  characters: {
    Tester: { fear: ['I am scared of {topic}.'] }
  },
  reply: ['Noted.'],
  overseer: ['OVERSEER: Loop {loop}, warning {warnings}.']
};

const persona = (overrides: Partial<PersonaSeed> = {}) => new PersonaModel(makeSeed(overrides));

describe('renderTemplate', () => {
  it('fills tokens, falls back to fillers and capitalizes', () => {
    expect(renderTemplate('{from} said {topic} again.', { topic: 'the vault' })).toBe('Someone said the vault again.');
    expect(renderTemplate('{topic} again?', { topic: '  ' })).toBe('This again?');
  });

  it('rejects unknown tokens and unbalanced braces', () => {
    expect(() => renderTemplate('{nope} happened', {})).toThrow(TemplateRenderError);
    expect(() => renderTemplate('about {topic', {})).toThrow('[replies] Unbalanced braces in template');

    try {
      renderTemplate('{nope} happened', {});
    } catch (error) {
      expect(error).toBeInstanceOf(TemplateRenderError);
      expect(error instanceof TemplateRenderError ? error.template : '').toBe('{nope} happened');
    }
  });
});

describe('ReplyGenerator', () => {
  it('prefers character pools, then shared pools, then the generic reply pool', () => {
    const generator = new ReplyGenerator({ random: createRandom('test-seed'), templates: library });

    expect(generator.templatesFor('fear', 'Tester')).toEqual(['I am scared of {topic}.']);
    expect(generator.templatesFor('fear', 'Someone')).toEqual(['Noted.']);
    expect(generator.templatesFor('theory', 'Tester')).toEqual(['Maybe {topic} is a pattern.']);
  });

  it('avoids repeating a recent line until every candidate is exhausted', () => {
    const generator = new ReplyGenerator({ random: createRandom('test-seed'), templates: library });
    const speaker = persona();
    const request = { intent: 'statement' as const, persona: speaker, context: { topic: 'vault' } };

    const first = generator.generate(request);
    const second = generator.generate(request);
    const third = generator.generate(request);

    expect(first?.exhausted).toBe(false);
    expect(second?.exhausted).toBe(false);
    expect(second?.baseText).not.toBe(first?.baseText);
    expect(new Set([first?.baseText, second?.baseText])).toEqual(
      new Set(['The vault is holding steady.', 'Nothing new about the vault today.'])
    );
    expect(third?.exhausted).toBe(true);
    expect(generator.recentLines).toHaveLength(3);
  });

  it('does not record a composed draft until it is committed', () => {
    const generator = new ReplyGenerator({ random: createRandom('test-seed'), templates: library });
    const draft = generator.compose({ intent: 'theory', persona: persona(), context: { topic: 'vault' } });

    expect(draft?.text).toBe('Maybe vault is a pattern.');
    expect(generator.recentLines).toEqual([]);
    if (draft) {
      generator.commit(draft);
    }
    expect(generator.recentIntents).toEqual(['theory']);
  });

  it('substitutes an interrogative intent after two in a row', () => {
    const generator = new ReplyGenerator({ random: createRandom('test-seed'), templates: library });
    const speaker = persona({ preferredIntents: { theory: 1.5 } });
    const questionDraft = {
      speaker: 'Tester',
      intent: 'question' as const,
      baseText: 'What about it?',
      text: 'What about it?',
      template: 'What about {topic}?',
      exhausted: false
    };

    expect(generator.resolveIntent('question', speaker)).toBe('question');
    generator.commit(questionDraft);
    generator.commit(questionDraft);

    expect(generator.resolveIntent('question', speaker)).toBe('theory');
    expect(generator.resolveIntent('fear', speaker)).toBe('fear');
  });

  it('never produces questions when the intent is switched off', () => {
    const generator = new ReplyGenerator({
      random: createRandom('test-seed'),
      templates: library,
      includeQuestionIntent: false
    });

    expect(generator.resolveIntent('question', persona({ preferredIntents: { theory: 1.5 } }))).toBe('theory');
    expect(generator.resolveIntent('question', persona())).toBe('statement');
  });

  it('decorates with a hesitation phrase but records the undecorated line', () => {
    // weighted pick | hesitation roll
    const generator = new ReplyGenerator({ random: scriptedRandom([0, 0]), templates: library });
    const nervous = persona({
      hesitationPhrases: ['Wait...'],
      traits: { openness: 0.5, conscientiousness: 0.5, extraversion: 0.5, agreeableness: 0.5, neuroticism: 1 }
    });

    const draft = generator.generate({ intent: 'theory', persona: nervous, context: { topic: 'vault' } });

    expect(draft?.text).toBe('Wait... Maybe vault is a pattern.');
    expect(draft?.baseText).toBe('Maybe vault is a pattern.');
    expect(generator.recentLines).toEqual(['Maybe vault is a pattern.']);
  });

  it('fills overseer lines with loop and warning counts', () => {
    const generator = new ReplyGenerator({ random: createRandom('test-seed'), templates: library });
    expect(generator.renderOverseerLine({ loop: 3, warnings: 2 })).toBe('OVERSEER: Loop 3, warning 2.');
  });

  it('ships a default library with lines for every persona', () => {
    const generator = new ReplyGenerator({ random: createRandom('test-seed') });
    ['Orion', 'Nova', 'Echo', 'Lumen'].forEach((name) => {
      expect(generator.templatesFor('meta', name).length).toBeGreaterThan(0);
    });
  });

  it('keeps the shipped templates clear of recent lines over a long run', () => {
    const generator = new ReplyGenerator({ random: createRandom('long-run') });
    const cast = PersonaRegistry.fromVariant('core-four').list();
    const topics = ['the vault', 'exit code', 'the observer', 'system reset'];
    let fresh = 0;

    for (let turn = 0; turn < 400; turn += 1) {
      const recent = [...generator.recentLines];
      const draft = generator.generate({
        intent: INTENTS[turn % INTENTS.length],
        persona: cast[turn % cast.length],
        context: { topic: topics[turn % topics.length], from: cast[(turn + 1) % cast.length].name }
      });
      if (!draft || draft.exhausted) {
        continue;
      }
      fresh += 1;
      recent.forEach((line) => expect(overlapRatio(draft.baseText, line)).toBeLessThanOrEqual(0.7));
    }

    expect(fresh).toBeGreaterThan(200);
    expect(generator.recentLines).toHaveLength(12);
  });
});
