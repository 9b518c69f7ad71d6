import { describe, it, expect } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { parseRegistryXml, parseRegistryFile, formatErrors } from '../parser.js';
import { BASE_REGISTRY } from './fixtures.js';

describe('parseRegistryXml', () => {
  it('loads base enum blocks in document order', () => {
    const result = parseRegistryXml(BASE_REGISTRY, 'vk.xml');
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.document.source).toBe('vk.xml');
      expect(result.document.enumBlocks).toEqual([
        {
          name: 'VkResult',
          enumerators: [
            { name: 'VK_SUCCESS', value: '0' },
            { name: 'VK_NOT_READY', value: '1' },
            { name: 'VK_ERROR_OUT_OF_HOST_MEMORY', value: '-1' },
          ],
        },
        {
          name: 'VkStructureType',
          enumerators: [{ name: 'VK_STRUCTURE_TYPE_APPLICATION_INFO', value: '0' }],
        },
      ]);
    }
  });

  it('keeps only extending enumerators of features', () => {
    const result = parseRegistryXml(BASE_REGISTRY);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.document.featureEnumerators).toEqual([
        {
          name: 'VK_ERROR_OUT_OF_POOL_MEMORY',
          extends: 'VkResult',
          extnumber: '70',
          offset: '0',
          dir: '-',
        },
        { name: 'VK_CULL_MODE_EXTRA_BIT', extends: 'VkCullModeFlagBits' },
      ]);
    }
  });

  it('loads supported extensions only', () => {
    const result = parseRegistryXml(BASE_REGISTRY);
    expect(result.success).toBe(true);
    if (result.success) {
      const { extensions } = result.document;
      expect(extensions.map((e) => [e.name, e.number])).toEqual([
        ['VK_KHR_surface', 1],
        ['VK_KHR_swapchain', 2],
      ]);
      expect(extensions[0]?.enumerators).toEqual([
        { name: 'VK_ERROR_SURFACE_LOST_KHR', extends: 'VkResult', offset: '0', dir: '-' },
      ]);
    }
  });

  it('accepts any root element name', () => {
    const result = parseRegistryXml(
      '<root><enums name="VkA" type="enum"><enum name="VK_A" value="1"/></enums></root>'
    );
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.document.enumBlocks[0]?.name).toBe('VkA');
    }
  });

  it('handles malformed XML', () => {
    const result = parseRegistryXml('<registry><enums name="VkA" type="enum"></registry>');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[0]?.message).toContain('XML parse error');
    }
  });

  it('reports enumerators without a name', () => {
    const result = parseRegistryXml(
      '<registry><enums name="VkResult" type="enum"><enum value="0"/></enums></registry>'
    );
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors).toEqual([
        { path: ['enums', 0, 'enum', 0, 'name'], message: 'Required' },
      ]);
    }
  });

  it('loads extending enumerators without a name', () => {
    const result = parseRegistryXml(
      '<registry><feature><require><enum extends="VkCullModeFlagBits" bitpos="4"/></require></feature></registry>'
    );
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.document.featureEnumerators).toEqual([{ extends: 'VkCullModeFlagBits' }]);
    }
  });

  it('reports supported extensions without a number', () => {
    const result = parseRegistryXml(
      '<registry><extensions><extension name="VK_KHR_x" supported="vulkan"/></extensions></registry>'
    );
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors).toEqual([
        { path: ['extensions', 0, 'extension', 0, 'number'], message: 'Required' },
      ]);
    }
  });

  it('reports non-decimal extension numbers', () => {
    const result = parseRegistryXml(
      '<registry><extensions><extension name="VK_KHR_x" number="two" supported="vulkan"/></extensions></registry>'
    );
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[0]?.message).toBe('Extension number must be a decimal integer');
    }
  });

  it('does not validate unsupported extensions', () => {
    const result = parseRegistryXml(
      '<registry><extensions><extension name="VK_KHR_x" supported="disabled"/></extensions></registry>'
    );
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.document.extensions).toEqual([]);
    }
  });
});

describe('parseRegistryFile', () => {
  it('reports missing files', () => {
    const result = parseRegistryFile('/nonexistent/vk.xml');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[0]?.message).toBe('Registry file not found: /nonexistent/vk.xml');
    }
  });

  it('reports directories as unreadable', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vk-enum-'));
    try {
      const result = parseRegistryFile(dir);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors[0]?.message.startsWith(`Cannot read ${dir}: `)).toBe(true);
      }
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('formatErrors', () => {
  it('formats errors with path', () => {
    const errors = [{ path: ['enums', 0, 'name'], message: 'Required' }];
    expect(formatErrors(errors)).toBe('  - enums.0.name: Required');
  });

  it('formats errors without path', () => {
    const errors = [{ path: [], message: 'General error' }];
    expect(formatErrors(errors)).toBe('  - General error');
  });

  it('formats multiple errors', () => {
    const errors = [
      { path: ['enums', 0, 'name'], message: 'Error 1' },
      { path: ['extensions', 0, 'extension', 1, 'number'], message: 'Error 2' },
    ];
    expect(formatErrors(errors)).toBe(
      '  - enums.0.name: Error 1\n  - extensions.0.extension.1.number: Error 2'
    );
  });
});
