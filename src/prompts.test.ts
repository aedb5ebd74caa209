import { describe, it, expect } from 'vitest';
import {
  CODE_SYSTEM_PROMPT,
  DESIGN_SYSTEM_PROMPT,
  buildChunkRequest,
  buildDesignRequest,
  buildMessagesForChunk,
  buildMessagesForDesign,
  sampleFiles,
} from './prompts.js';
import type { CodeChunk } from './types.js';

const chunk: CodeChunk = {
  file_path: '/repo/src/Cart.java',
  class_name: 'Cart',
  content_with_lines: '1 | class Cart {\n2 |   int total() { return 0; }\n3 | }',
  language: 'java',
  metadata: {},
};

describe('buildMessagesForChunk', () => {
  const [system, user] = buildMessagesForChunk(chunk, 4);

  it('sends the code instructions as the system message', () => {
    expect(system).toEqual({ role: 'system', content: CODE_SYSTEM_PROMPT });
    expect(user.role).toBe('user');
  });

  it('embeds the chunk verbatim in a text fence', () => {
    expect(user.content).toContain('File path: /repo/src/Cart.java\nClass / module: Cart\n');
    expect(user.content).toContain(`\`\`\`text\n${chunk.content_with_lines}\n\`\`\``);
  });

  it('asks for the requested number of samples under "samples"', () => {
    expect(user.content).toContain('Propose 4 realistic questions');
    expect(user.content).toContain('"samples": [');
  });

  it('wraps the messages in a code request', () => {
    const request = buildChunkRequest(chunk, 2);
    expect(request.count).toBe(2);
    expect(request.scene).toBe('code');
    expect(request.messages).toEqual(buildMessagesForChunk(chunk, 2));
  });
});

describe('buildMessagesForDesign', () => {
  const [system, user] = buildMessagesForDesign(['a.ts', 'b.ts', 'c.ts'], ['b.ts'], 2);

  it('lists every file and the sample as bullets', () => {
    expect(system.content).toBe(DESIGN_SYSTEM_PROMPT);
    expect(user.content).toContain('(partial):\n\n- a.ts\n- b.ts\n- c.ts\n');
    expect(user.content).toContain('(subset):\n\n- b.ts\n');
  });

  it('asks for plans', () => {
    expect(user.content).toContain('Propose 2 realistic new features');
    expect(user.content).toContain('"plans": [');
  });

  it('wraps the messages in a design request', () => {
    expect(buildDesignRequest(['a.ts'], [], 1)).toMatchObject({ count: 1, scene: 'design' });
  });
});

describe('sampleFiles', () => {
  const files = ['a', 'b', 'c'];

  it('takes the leading files when the source always returns 0', () => {
    expect(sampleFiles(files, 2, () => 0)).toEqual(['a', 'b']);
  });

  it('swaps from the tail when the source is near 1', () => {
    expect(sampleFiles(files, 2, () => 0.999)).toEqual(['c', 'a']);
  });

  it('caps the sample at the number of files', () => {
    expect(sampleFiles(files, 10, () => 0)).toEqual(['a', 'b', 'c']);
  });

  it('returns nothing for n = 0 or no files', () => {
    expect(sampleFiles(files, 0)).toEqual([]);
    expect(sampleFiles([], 5)).toEqual([]);
  });

  it('draws distinct files without touching the input', () => {
    const input = Array.from({ length: 30 }, (_, i) => `f${i}.ts`);
    const picked = sampleFiles(input, 12);

    expect(new Set(picked).size).toBe(12);
    expect(picked.every(p => input.includes(p))).toBe(true);
    expect(input[0]).toBe('f0.ts');
    expect(input[29]).toBe('f29.ts');
  });
});
