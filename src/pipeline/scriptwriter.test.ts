import type { ClaudeClient } from '../ai/claude.js';
import type { Paper } from '../sources/paper.js';
import { ScriptGenError } from '../utils/errors.js';
import { buildScriptPrompt, createClaudeScriptWriter } from './scriptwriter.js';

const paper: Paper = {
  id: '2401.00001',
  title: 'Sparse Widgets',
  abstract: 'We study widgets.',
  fullText: 'We study widgets. Section 1 introduces them.',
  figures: [
    { index: 0, bytes: Buffer.alloc(0), name: 'img-000.png' },
    { index: 1, bytes: Buffer.alloc(0), name: 'img-001.png' },
    { index: 2, bytes: Buffer.alloc(0), name: 'img-002.png' },
  ],
};

function fakeClient(text: string | Error): ClaudeClient & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    prompts,
    async generateCompletion(prompt) {
      prompts.push(prompt);
      if (text instanceof Error) throw text;
      return { text, inputTokens: 10, outputTokens: 20 };
    },
  };
}

describe('buildScriptPrompt', () => {
  it('asks for a scene range around the target and describes the figures', () => {
    const prompt = buildScriptPrompt(paper, 5);

    expect(prompt).toContain('into a 4-6 scene video script');
    expect(prompt).toContain('The paper has 3 figures, numbered 1 to 3 in order of appearance.');
    expect(prompt).toContain('Title: Sparse Widgets');
    expect(prompt).toContain('Excerpt:\nWe study widgets. Section 1 introduces them.');
  });

  it('omits the excerpt when only the abstract is known', () => {
    const prompt = buildScriptPrompt({ ...paper, fullText: paper.abstract, figures: [] }, 1);

    expect(prompt).toContain('into a 1-2 scene video script');
    expect(prompt).not.toContain('Excerpt:');
    expect(prompt).toContain('No figures could be extracted from the paper');
  });
});

describe('createClaudeScriptWriter', () => {
  it('parses the completion against the paper\'s figures', async () => {
    const client = fakeClient('Scene 1:\nTitle: Widgets\nText: Widgets are sparse.\nFigure Hint: Figure 2');
    const writer = createClaudeScriptWriter(client);

    const script = await writer.generateScript(paper, 3);

    expect(script).toEqual([
      { title: 'Widgets', narration: 'Widgets are sparse.', visual: { kind: 'figure', index: 1 }, figureHint: 'Figure 2' },
    ]);
    expect(client.prompts).toHaveLength(1);
  });

  it('wraps client failures in ScriptGenError', async () => {
    const writer = createClaudeScriptWriter(fakeClient(new Error('rate limited')));

    const run = writer.generateScript(paper, 3);

    await expect(run).rejects.toBeInstanceOf(ScriptGenError);
    await expect(run).rejects.toThrow('Script generation failed: rate limited');
  });

  it('rejects completions without usable scenes', async () => {
    const writer = createClaudeScriptWriter(fakeClient('Sorry, I cannot read that paper.'));

    await expect(writer.generateScript(paper, 3)).rejects.toThrow('Script writer returned no usable scenes');
  });
});
