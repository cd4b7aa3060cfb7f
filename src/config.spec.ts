import { loadConfig } from './config';

describe('loadConfig', () => {
  it('should default to no debug output and compact JSON', () => {
    expect(loadConfig({})).toEqual({ debug: false, jsonIndent: 0 });
  });

  it('should read the debug flag and indent', () => {
    expect(loadConfig({ CODE_INSIGHTS_DEBUG: 'TRUE', CODE_INSIGHTS_JSON_INDENT: '2' })).toEqual({
      debug: true,
      jsonIndent: 2,
    });
    expect(loadConfig({ CODE_INSIGHTS_DEBUG: '1' }).debug).toBe(true);
    expect(loadConfig({ CODE_INSIGHTS_DEBUG: 'yes' }).debug).toBe(false);
  });

  it('should fall back to compact JSON for unusable indents', () => {
    expect(loadConfig({ CODE_INSIGHTS_JSON_INDENT: 'wide' }).jsonIndent).toBe(0);
    expect(loadConfig({ CODE_INSIGHTS_JSON_INDENT: '-1' }).jsonIndent).toBe(0);
    expect(loadConfig({ CODE_INSIGHTS_JSON_INDENT: '11' }).jsonIndent).toBe(0);
    expect(loadConfig({ CODE_INSIGHTS_JSON_INDENT: '2abc' }).jsonIndent).toBe(0);
    expect(loadConfig({ CODE_INSIGHTS_JSON_INDENT: '2.5' }).jsonIndent).toBe(0);
  });
});
