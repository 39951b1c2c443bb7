import { describe, expect, it } from 'vitest';
import { DuplicateToolError, UnknownToolError, ValidationError } from '../errors.js';
import { ToolRegistry } from './registry.js';
import { createTool } from './tool.js';
import type { Tool } from '../types/tool.js';

function makeTool(name: string, output = `${name} output`): Tool {
  return createTool({ name, description: `${name} tool`, handler: () => output });
}

describe('ToolRegistry', () => {
  describe('register / resolve', () => {
    it('resolves exactly the registered tool for each name', async () => {
      const alpha = makeTool('alpha');
      const beta = makeTool('beta');
      const registry = new ToolRegistry([alpha, beta]);

      expect(registry.resolve('alpha')).toBe(alpha);
      expect(registry.resolve('beta')).toBe(beta);
      await expect(registry.resolve('beta').invoke({})).resolves.toBe('beta output');
    });

    it('fails with UnknownToolError for any other name', () => {
      const registry = new ToolRegistry([makeTool('alpha'), makeTool('beta')]);

      expect(() => registry.resolve('gamma')).toThrow(UnknownToolError);
      expect(() => registry.resolve('gamma')).toThrow('Unknown tool "gamma". Available tools: alpha, beta');
      expect(() => new ToolRegistry().resolve('x')).toThrow('Unknown tool "x". Available tools: (none)');
    });

    it('rejects a duplicate name and keeps the first registration', () => {
      const first = makeTool('dup', 'first');
      const registry = new ToolRegistry([first]);

      expect(() => registry.register(makeTool('dup', 'second'))).toThrow(DuplicateToolError);
      expect(() => registry.register(makeTool('dup', 'second'))).toThrow('Tool "dup" is already registered');
      expect(registry.resolve('dup')).toBe(first);
      expect(registry.size).toBe(1);
    });

    it('reports membership and size', () => {
      const registry = new ToolRegistry();
      registry.register(makeTool('a'));
      registry.register(makeTool('b'));

      expect(registry.has('a')).toBe(true);
      expect(registry.has('c')).toBe(false);
      expect(registry.size).toBe(2);
    });
  });

  describe('list / definitions', () => {
    it('keeps registration order', () => {
      const registry = new ToolRegistry([makeTool('zeta'), makeTool('alpha'), makeTool('mu')]);

      expect(registry.list().map((t) => t.name)).toEqual(['zeta', 'alpha', 'mu']);
      expect(registry.names()).toEqual(['zeta', 'alpha', 'mu']);
    });

    it('advertises definitions without handlers', () => {
      const registry = new ToolRegistry([makeTool('alpha')]);

      expect(registry.definitions()).toEqual([
        { name: 'alpha', description: 'alpha tool', parameters: { type: 'object', properties: {} } },
      ]);
    });
  });

  describe('lock', () => {
    it('refuses registrations once locked', () => {
      const registry = new ToolRegistry([makeTool('a')]).lock();

      expect(registry.locked).toBe(true);
      expect(() => registry.register(makeTool('b'))).toThrow(ValidationError);
      expect(registry.size).toBe(1);
    });
  });
});
