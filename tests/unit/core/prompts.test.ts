import { describe, expect, it } from '@jest/globals';
import { buildPrompts, loadPromptTemplates, renderTemplate } from '../../../src/core/prompts.js';
import { EMPTY_KNOWLEDGE } from '../../../src/core/knowledge.js';
import { TEST_KNOWLEDGE } from '../../helpers/fakes.js';

describe('prompts', () => {
  it('fills known placeholders and blanks unknown ones', () => {
    expect(renderTemplate('a {{x}} b {{y}}', { x: '1' })).toBe('a 1 b ');
  });

  it('loads the bundled templates', async () => {
    const t = await loadPromptTemplates();
    expect(t.system).toContain('{{readme}}');
    expect(t.system).toContain('비밀이에요 🤫 공식적으로 공개되지 않은 정보입니다.');
    expect(t.refine.length).toBeGreaterThan(0);
  });

  it('substitutes knowledge documents into the system prompt', () => {
    const knowledge = { ...TEST_KNOWLEDGE, docs: { readme: 'README-BODY', ruleSpec: 'RULES-BODY', arrivedHook: '' } };
    const p = buildPrompts({ system: '[R]{{readme}}[S]{{ruleSpec}}[A]{{arrivedHook}}', refine: 'r', web_context: 'w' }, knowledge);
    expect(p).toEqual({ system: '[R]README-BODY[S]RULES-BODY[A]', refine: 'r', webContext: 'w' });
  });

  it('falls back to built-in instructions for empty templates', () => {
    const p = buildPrompts({ system: '', refine: '', web_context: '' }, EMPTY_KNOWLEDGE);
    expect(p.refine).toBe('아래 초안을 다듬어 출력하세요.');
    expect(p.webContext).toBe('Web context (non-authoritative):');
  });
});
