import { describe, it, expect } from 'vitest';
import { NotFoundError } from '../errors/index.js';
import { loadPromptCatalogue, renderTemplate, StaticContentGenerator } from './static-generator.js';

describe('renderTemplate', () => {
  it('should fill placeholders and blank unknown ones', () => {
    expect(renderTemplate('Do {{habit}} at {{ time }}{{missing}}.', { habit: 'a walk', time: '9:00' })).toBe(
      'Do a walk at 9:00.'
    );
  });
});

describe('StaticContentGenerator', () => {
  it('should render a catalogue prompt', async () => {
    const generator = new StaticContentGenerator({ flow: { hello: 'Hi {{name}}!' } });

    await expect(
      generator.generate('p1', { flowType: 'flow', prompt: 'hello', variables: { name: 'Sam' } })
    ).resolves.toBe('Hi Sam!');
  });

  it('should reject an unknown prompt', async () => {
    const generator = new StaticContentGenerator({ flow: {} });

    await expect(generator.generate('p1', { flowType: 'flow', prompt: 'nope' })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should ship every prompt the flows send', () => {
    const catalogue = loadPromptCatalogue();

    expect(Object.keys(catalogue.micro_health_intervention)).toEqual([
      'orientation',
      'commitment_prompt',
      'feeling_prompt',
      'intervention_immediate',
      'intervention_reflective',
      'reinforcement_followup',
      'did_you_get_a_chance',
      'context_question',
      'mood_question',
      'barrier_check',
      'barrier_reason',
      'ignored_path',
      'end_of_day',
    ]);
    expect(catalogue.habit_schedule.daily_prompt).toBe("Time for your habit: {{habit}}. Reply when you're done!");
  });
});
