import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  cleanKey,
  parseStructuredOutput,
  repairLiteralControlChars,
  sanitizeKeys,
  unwrapCodeFence
} from '../index';

describe('parseStructuredOutput', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns well-formed output unchanged apart from the extra split', () => {
    const payload = {
      drawing_info: { drawing_number: 'PID-100', revision: 'B' },
      issues: [{ pid_reference: 'V-101', issue_observed: 'Missing PSV on vessel' }],
      summary: { total_issues: 1 },
      project: 'Unit 4 revamp'
    };

    const result = parseStructuredOutput(JSON.stringify(payload));

    expect(result.recovery_status).toBe('ok');
    expect(result.issue_count).toBe(1);
    expect(result.diagnostic).toBeUndefined();
    expect(result.extra).toEqual({ project: 'Unit 4 revamp' });
    expect({ ...result.extra, drawing_info: result.drawing_info, issues: result.issues, summary: result.summary }).toEqual(
      payload
    );
  });

  it('cleans whitespace and quote noise from keys at every depth', () => {
    const raw = JSON.stringify({
      '\n  "drawing_info"': { drawing_number: 'P-1' },
      issues: [{ ' "pid_reference" ': 'V-101' }],
      summary: {}
    });

    const result = parseStructuredOutput(raw);

    expect(result.recovery_status).toBe('ok');
    expect(result.drawing_info).toEqual({ drawing_number: 'P-1' });
    expect(result.issues).toEqual([{ pid_reference: 'V-101' }]);
  });

  it('drops keys that are empty after cleaning', () => {
    const result = parseStructuredOutput(JSON.stringify({ '  ""  ': 1, issues: [], summary: {}, drawing_info: {} }));

    expect(result.recovery_status).toBe('ok');
    expect(result.extra).toEqual({});
  });

  it('keeps the later value when two keys clean to the same name', () => {
    const raw = JSON.stringify({ '"drawing_info"': { revision: 'A' }, drawing_info: { revision: 'C' } });

    expect(parseStructuredOutput(raw).drawing_info).toEqual({ revision: 'C' });
  });

  it('defaults each mis-shaped field independently', () => {
    const result = parseStructuredOutput(JSON.stringify({ issues: 'none', summary: [], drawing_info: { sheet: 2 } }));

    expect(result.recovery_status).toBe('ok');
    expect(result.issues).toEqual([]);
    expect(result.issue_count).toBe(0);
    expect(result.summary).toEqual({});
    expect(result.drawing_info).toEqual({ sheet: 2 });
  });

  it('unwraps a markdown code fence before decoding', () => {
    const raw = '```json\n{"issues":[{"pid_reference":"P-2001A"}],"summary":{},"drawing_info":{}}\n```';

    const result = parseStructuredOutput(raw);

    expect(result.recovery_status).toBe('ok');
    expect(result.issue_count).toBe(1);
  });

  it('recovers fields whose strings carry raw newlines', () => {
    const raw = '{"issues": [{"issue_observed": "line one\nline two"}], "summary": {}, "drawing_info": {}';

    const result = parseStructuredOutput(raw);

    expect(result.recovery_status).toBe('recovered');
    expect(result.issues).toEqual([{ issue_observed: 'line one\nline two' }]);
  });

  it('recovers the decodable fields of malformed output with escaped key noise', () => {
    const raw = String.raw`{
  "\n  \"drawing_info\"": {"drawing_number": "PID-7"},
  "issues": [ {"pid_reference": "V-1"} ,, ],
  "summary": {"total_issues": 1}
`;

    const result = parseStructuredOutput(raw);

    expect(result.recovery_status).toBe('recovered');
    expect(result.drawing_info).toEqual({ drawing_number: 'PID-7' });
    expect(result.summary).toEqual({ total_issues: 1 });
    expect(result.issues).toEqual([]);
    expect(result.issue_count).toBe(0);
    expect(result.diagnostic).toContain('Recovered summary, drawing_info from malformed output');
  });

  it('keeps the complete elements of a truncated issues array', () => {
    const raw =
      '{"drawing_info": {"drawing_number": "PID-9"}, "issues": [{"serial_number": 1}, {"serial_number": 2}, {"serial_nu';

    const result = parseStructuredOutput(raw);

    expect(result.recovery_status).toBe('recovered');
    expect(result.issues).toEqual([{ serial_number: 1 }, { serial_number: 2 }]);
    expect(result.issue_count).toBe(2);
    expect(result.drawing_info).toEqual({ drawing_number: 'PID-9' });
    expect(result.summary).toEqual({});
  });

  it('ignores structured keys nested inside another field', () => {
    const raw =
      '{"issues": [{"description": "x", "summary": {"note": "nested"}} ,, ], "drawing_info": {"a": 1}';

    const result = parseStructuredOutput(raw);

    expect(result.recovery_status).toBe('recovered');
    expect(result.summary).toEqual({});
    expect(result.issues).toEqual([]);
    expect(result.drawing_info).toEqual({ a: 1 });
  });

  it('prefers the outermost key even when a nested one appears first', () => {
    const raw = '{"wrapper": [{"summary": {"nested": true}}], "summary": {"total_issues": 3}, "issues": [';

    expect(parseStructuredOutput(raw).summary).toEqual({ total_issues: 3 });
  });

  it.each([
    ['a run of quotes', '{' + '"'.repeat(40_000)],
    ['alternating spaces and quotes', '{' + ' "'.repeat(20_000)],
    ['repeated quoted key names', '{' + '"summary" '.repeat(4_000)]
  ])('recovers quickly from %s', (_, raw) => {
    const started = performance.now();
    const result = parseStructuredOutput(raw);

    expect(performance.now() - started).toBeLessThan(1_000);
    expect(result.recovery_status).toBe('minimal');
  });

  it('falls back to the minimal result when nothing is recoverable', () => {
    const result = parseStructuredOutput('The model declined to produce a review.');

    expect(result.recovery_status).toBe('minimal');
    expect(result.issues).toEqual([]);
    expect(result.summary).toEqual({});
    expect(result.drawing_info).toEqual({});
    expect(result.issue_count).toBe(0);
    expect(result.diagnostic).toEqual(expect.any(String));
  });

  it('treats a non-object top-level value as malformed', () => {
    expect(parseStructuredOutput('[{"a": 1}]').recovery_status).toBe('minimal');

    const nested = parseStructuredOutput('[{"issues": [{"a": 1}]}]');
    expect(nested.recovery_status).toBe('recovered');
    expect(nested.issues).toEqual([{ a: 1 }]);
  });

  it.each(['', '{', '}{', '[[[', 'null', '{"issues": [', '```', '"issues": 42'])(
    'never throws and stays consistent for %j',
    (raw) => {
      const result = parseStructuredOutput(raw);

      expect(['ok', 'recovered', 'minimal']).toContain(result.recovery_status);
      expect(result.issue_count).toBe(result.issues.length);
      expect(Array.isArray(result.issues)).toBe(true);
    }
  );

  it('is deterministic for identical input', () => {
    const raw = '{"issues": [{"a": 1}], "summary": {"total_issues": 1}, "drawing_info": {"x": ';

    expect(parseStructuredOutput(raw)).toEqual(parseStructuredOutput(raw));
  });

  it('returns a deeply frozen result', () => {
    const result = parseStructuredOutput(JSON.stringify({ issues: [{ a: 1 }], summary: {}, drawing_info: { b: 2 } }));

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.issues)).toBe(true);
    expect(Object.isFrozen(result.issues[0])).toBe(true);
    expect(Object.isFrozen(result.drawing_info)).toBe(true);
    expect(() => {
      result.issues.push(1);
    }).toThrow(TypeError);
  });

  it('keeps numbers beyond double range as decoded', () => {
    const result = parseStructuredOutput('{"issues": [], "summary": {"area": 1e400, "offset": -1e400}, "drawing_info": {}}');

    expect(result.recovery_status).toBe('ok');
    expect(result.summary).toEqual({ area: Number.POSITIVE_INFINITY, offset: Number.NEGATIVE_INFINITY });
  });

  it('keeps __proto__ as an ordinary key', () => {
    const result = parseStructuredOutput('{"__proto__": {"polluted": true}, "issues": []}');

    expect(Object.hasOwn(result.extra, '__proto__')).toBe(true);
    expect(Object.prototype).not.toHaveProperty('polluted');
  });
});

describe('sanitizeKeys', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('falls back to the original key when cleaning throws', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const sanitized = sanitizeKeys(
      { bad: 1, ' good ': 2 },
      {
        cleanKey: (key) => {
          if (key === 'bad') throw new Error('boom');
          return key.trim();
        }
      }
    );

    expect(sanitized).toEqual({ bad: 1, good: 2 });
    expect(errorSpy).toHaveBeenCalledWith(expect.objectContaining({ scope: 'structured_output_sanitize', error: 'boom' }));
  });

  it('reports dropped keys through the callback', () => {
    const dropped: string[] = [];

    const sanitized = sanitizeKeys({ '" "': 1, ok: 2 }, { onKeyDropped: (key) => dropped.push(key) });

    expect(sanitized).toEqual({ ok: 2 });
    expect(dropped).toEqual(['" "']);
  });
});

describe('helpers', () => {
  it('strips quote and whitespace noise until stable', () => {
    expect(cleanKey(`\n "\t'drawing_info'" `)).toBe('drawing_info');
    expect(cleanKey(`"a'b"`)).toBe("a'b");
  });

  it('leaves clean keys as they are', () => {
    for (const key of ['drawing_info', 'issues', "a'b", 'two words']) {
      expect(cleanKey(key)).toBe(key);
      expect(cleanKey(cleanKey(` "${key}" `))).toBe(cleanKey(` "${key}" `));
    }
  });

  it('unwraps an unterminated code fence', () => {
    expect(unwrapCodeFence('```json\n{"issues": []')).toBe('{"issues": []');
    expect(unwrapCodeFence('{"issues": []}')).toBe('{"issues": []}');
  });

  it('escapes control characters only inside string literals', () => {
    expect(repairLiteralControlChars('{\n"a": "x\ny\tz"}')).toBe('{\n"a": "x\\ny\\tz"}');
  });
});
