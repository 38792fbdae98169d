import { describe, it, expect } from 'vitest';
import type { Result } from './errors';
import { Layout } from './layout';
import { fromJson, toJson, toJsonPretty } from './serialization';
import { createWidgetConfig, withClass, withProperty, withStyle } from './widgetConfig';

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

function sample(): Layout {
  let config = withProperty(createWidgetConfig('basic.button'), 'text', 'Go');
  config = withStyle(withClass(config, 'cta'), 'padding', '8px');
  let layout = unwrap(Layout.empty().addRootWidget('page', createWidgetConfig('container.column')));
  layout = unwrap(layout.addChildWidget('page', 'cta', config));
  layout = unwrap(layout.setWidgetMetadata('cta', 'locked', false));
  return layout.setMetadata('title', 'Home');
}

describe('JSON codec', () => {
  it('writes the snake_case wire format', () => {
    const layout = unwrap(Layout.empty().addRootWidget('a', createWidgetConfig('text')));
    expect(unwrap(toJson(layout))).toBe(
      '{"version":"1.0","root_nodes":["a"],"nodes":{"a":{"config":{"widget_type":"text",' +
        '"properties":{},"css_classes":[],"inline_styles":{}},"children":[],"parent":null,' +
        '"metadata":{}}},"metadata":{}}',
    );
  });

  it('pretty-prints with two spaces', () => {
    expect(unwrap(toJsonPretty(Layout.empty()))).toBe(
      '{\n  "version": "1.0",\n  "root_nodes": [],\n  "nodes": {},\n  "metadata": {}\n}',
    );
  });

  it('round trips a layout', () => {
    const json = unwrap(toJson(sample()));
    const decoded = unwrap(fromJson(json));
    expect(unwrap(toJson(decoded))).toBe(json);
    expect(decoded.getWidget('cta')?.config).toEqual({
      widgetType: 'basic.button',
      properties: { text: 'Go' },
      cssClasses: ['cta'],
      inlineStyles: { padding: '8px' },
    });
    expect(decoded.getWidget('cta')?.metadata).toEqual({ locked: false });
    expect(decoded.metadata).toEqual({ title: 'Home' });
  });

  it('keeps the stored version string', () => {
    const layout = unwrap(fromJson('{"version":"2.5","root_nodes":[],"nodes":{}}'));
    expect(layout.version).toBe('2.5');
    expect(layout.metadata).toEqual({});
  });

  it('fills in omitted config fields', () => {
    const layout = unwrap(
      fromJson(
        '{"version":"1.0","root_nodes":["a"],"nodes":{"a":{"config":{"widget_type":"text"},"children":[],"parent":null}}}',
      ),
    );
    expect(layout.getWidget('a')).toEqual({
      config: { widgetType: 'text', properties: {}, cssClasses: [], inlineStyles: {} },
      children: [],
      parent: null,
      metadata: {},
    });
  });

  it('rejects a missing root node', () => {
    const result = fromJson('{"version":"1.0","root_nodes":["a"],"nodes":{},"metadata":{}}');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('deserialization');
      expect(result.error.message).toBe('Deserialization error: Invalid operation: Root node a not found in nodes');
    }
  });

  it('rejects a dangling child reference', () => {
    const result = fromJson(
      '{"version":"1.0","root_nodes":["r"],"nodes":{"r":{"config":{"widget_type":"container.row"},' +
        '"children":["ghost"],"parent":null}}}',
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        'Deserialization error: Invalid operation: Node r references non-existent child ghost',
      );
    }
  });

  it('rejects malformed and empty text', () => {
    const broken = fromJson('{not json');
    expect(broken.ok).toBe(false);
    if (!broken.ok) {
      expect(broken.error.kind).toBe('deserialization');
      expect(broken.error.message.startsWith('Deserialization error: ')).toBe(true);
    }
    const empty = fromJson('   ');
    expect(empty.ok).toBe(false);
    if (!empty.ok) expect(empty.error.message).toBe('Deserialization error: Empty layout document');
  });

  it('reports shape errors by path', () => {
    const result = fromJson('{"version":"1.0","root_nodes":"a","nodes":{}}');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Deserialization error: root_nodes: Expected array, received string');
    }
  });

  it('refuses to write non-finite numbers', () => {
    const config = withProperty(createWidgetConfig('layout.spacer'), 'height', Number.POSITIVE_INFINITY);
    const layout = unwrap(Layout.empty().addRootWidget('gap', config));
    const result = toJson(layout);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('serialization');
      expect(result.error.message).toBe('Serialization error: Widget gap holds a non-finite number');
    }
  });

  it('round trips __proto__ as an ordinary key', () => {
    const config = withStyle(withProperty(createWidgetConfig('text'), '__proto__', 'x'), '__proto__', 'y');
    const layout = unwrap(Layout.empty().addRootWidget('a', config)).setMetadata('__proto__', 1);
    const json = unwrap(toJson(layout));
    expect(json).toBe(
      '{"version":"1.0","root_nodes":["a"],"nodes":{"a":{"config":{"widget_type":"text",' +
        '"properties":{"__proto__":"x"},"css_classes":[],"inline_styles":{"__proto__":"y"}},' +
        '"children":[],"parent":null,"metadata":{}}},"metadata":{"__proto__":1}}',
    );

    const decoded = unwrap(fromJson(json));
    expect(Object.keys(decoded.getWidget('a')?.config.properties ?? {})).toEqual(['__proto__']);
    expect(unwrap(toJson(decoded))).toBe(json);
  });

  it('rejects __proto__ as a node id', () => {
    const result = fromJson(
      '{"version":"1.0","root_nodes":["__proto__"],"nodes":{"__proto__":{"config":{"widget_type":"text"},' +
        '"children":[],"parent":null}}}',
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Deserialization error: Invalid operation: Widget id __proto__ is reserved');
    }
  });

  it('rejects a non-JSON property map', () => {
    const result = fromJson(
      '{"version":"1.0","root_nodes":[],"nodes":{},"metadata":[1]}',
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Deserialization error: metadata: Expected an object of JSON values');
    }
  });
});
