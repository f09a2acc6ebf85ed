import { describe, it, expect } from 'vitest';
import { extractJsonCandidates, parseJsonOutput, scanBalancedJsonBlocks, stripCodeFences } from './json-extract.js';

describe('json-extract', () => {
  it('should strip json code fences', () => {
    expect(stripCodeFences('```json\n{"calls": []}\n```')).toBe('{"calls": []}');
  });

  it('should find balanced blocks and ignore braces inside strings', () => {
    const text = 'Sure: {"reply": "use } carefully", "calls": []} and [1, [2]]';
    expect(scanBalancedJsonBlocks(text)).toEqual(['{"reply": "use } carefully", "calls": []}', '[1, [2]]']);
  });

  it('should try the whole text before embedded blocks', () => {
    expect(extractJsonCandidates(' prefix {"a": 1} suffix ')).toEqual(['prefix {"a": 1} suffix', '{"a": 1}']);
    expect(extractJsonCandidates('[{"tool": "x"}]')).toEqual(['[{"tool": "x"}]']);
  });

  it('should parse JSON surrounded by prose', () => {
    expect(parseJsonOutput('Here is the plan:\n{"calls": [{"tool": "assign_exercise", "arguments": {}}]}\nDone.')).toEqual({
      calls: [{ tool: 'assign_exercise', arguments: {} }],
    });
  });

  it('should return undefined when nothing parses', () => {
    expect(parseJsonOutput('I am not sure what you mean.')).toBeUndefined();
    expect(parseJsonOutput('{not json}')).toBeUndefined();
  });
});
