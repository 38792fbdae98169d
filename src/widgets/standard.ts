import type { JsonObject, WidgetConfig } from '../types';
import { InvalidConfigError } from '../core/errors';
import { getProperty } from '../core/widgetConfig';
import { createWidgetRegistry, type WidgetDefinition, type WidgetRegistry } from '../core/registry';

type WidgetSpec = {
  type: string;
  displayName: string;
  description: string;
  canHaveChildren?: boolean;
  properties?: JsonObject;
  styles?: Record<string, string>;
  validateConfig?: WidgetDefinition['validateConfig'];
};

function defineWidget(spec: WidgetSpec): WidgetDefinition {
  const definition: WidgetDefinition = {
    type: spec.type,
    displayName: spec.displayName,
    description: spec.description,
    canHaveChildren: spec.canHaveChildren ?? false,
    defaultConfig: (): WidgetConfig => ({
      widgetType: spec.type,
      properties: { ...spec.properties },
      cssClasses: [],
      inlineStyles: { ...spec.styles },
    }),
  };
  return spec.validateConfig ? { ...definition, validateConfig: spec.validateConfig } : definition;
}

const GAP = 'var(--wysiwyg-spacing, 8px)';
const FIELD_STYLES = {
  width: '100%',
  padding: '8px 12px',
  border: '1px solid #d1d5db',
  'border-radius': '4px',
  'font-size': '14px',
};

function validateHeading(config: WidgetConfig): InvalidConfigError | null {
  const level = getProperty(config, 'level');
  if (level === undefined) return null;
  if (typeof level !== 'number' || !Number.isInteger(level) || level < 1 || level > 6) {
    return new InvalidConfigError(`heading level must be an integer from 1 to 6, got ${JSON.stringify(level)}`);
  }
  return null;
}

/** Built-in catalog, in palette order: layout, text, interactive, form, other. */
export const standardWidgets: readonly WidgetDefinition[] = [
  defineWidget({
    type: 'container.row',
    displayName: 'Row Container',
    description: 'Arranges child widgets horizontally in a row',
    canHaveChildren: true,
    styles: { display: 'flex', 'flex-direction': 'row', gap: GAP },
  }),
  defineWidget({
    type: 'container.column',
    displayName: 'Column Container',
    description: 'Arranges child widgets vertically in a column',
    canHaveChildren: true,
    styles: { display: 'flex', 'flex-direction': 'column', gap: GAP },
  }),
  defineWidget({
    type: 'container.grid',
    displayName: 'Grid Container',
    description: 'Arranges child widgets in a responsive grid',
    canHaveChildren: true,
    styles: {
      display: 'grid',
      'grid-template-columns': 'repeat(auto-fit, minmax(200px, 1fr))',
      gap: GAP,
    },
  }),
  defineWidget({
    type: 'container.card',
    displayName: 'Card',
    description: 'A styled card/panel that can contain other widgets',
    canHaveChildren: true,
    properties: { title: '' },
    styles: {
      border: '1px solid #e5e7eb',
      'border-radius': '8px',
      padding: '16px',
      background: '#ffffff',
    },
  }),
  defineWidget({
    type: 'layout.spacer',
    displayName: 'Spacer',
    description: 'Empty space for layout control',
    properties: { height: 20 },
  }),
  defineWidget({
    type: 'text.heading',
    displayName: 'Heading',
    description: 'Heading element (H1-H6)',
    properties: { content: 'Heading', level: 1 },
    validateConfig: validateHeading,
  }),
  defineWidget({
    type: 'text.paragraph',
    displayName: 'Paragraph',
    description: 'Paragraph of text with optional Markdown support',
    properties: { content: 'This is a paragraph of text.', markdown: false },
  }),
  defineWidget({
    type: 'text',
    displayName: 'Text',
    description: 'Rich text with formatting support',
    properties: { content: 'Enter text here...', bold: false, italic: false, underline: false },
  }),
  defineWidget({
    type: 'basic.button',
    displayName: 'Button',
    description: 'A clickable button',
    properties: { text: 'Click me', variant: 'primary' },
    styles: { padding: '8px 16px', border: 'none', 'border-radius': '4px', cursor: 'pointer' },
  }),
  defineWidget({
    type: 'basic.link',
    displayName: 'Link',
    description: 'A clickable link container - put images, text, or any widget inside',
    canHaveChildren: true,
    properties: { href: 'https://example.com', target: '_self' },
    styles: { color: '#3b82f6', 'text-decoration': 'none', display: 'inline-block' },
  }),
  defineWidget({
    type: 'basic.image',
    displayName: 'Image',
    description: 'An image with configurable source and alt text',
    properties: { src: '', alt: 'Placeholder image' },
    styles: { 'max-width': '100%', height: 'auto', display: 'block' },
  }),
  defineWidget({
    type: 'form.textinput',
    displayName: 'Text Input',
    description: 'Single-line text input field',
    properties: { placeholder: 'Enter text...', label: '', type: 'text' },
    styles: FIELD_STYLES,
  }),
  defineWidget({
    type: 'form.textarea',
    displayName: 'Text Area',
    description: 'Multi-line text input field',
    properties: { placeholder: 'Enter text...', label: '', rows: 4 },
    styles: { ...FIELD_STYLES, resize: 'vertical' },
  }),
  defineWidget({
    type: 'form.checkbox',
    displayName: 'Checkbox',
    description: 'Checkbox input field',
    properties: { label: 'Check me', checked: false },
  }),
  defineWidget({
    type: 'basic.divider',
    displayName: 'Divider',
    description: 'A horizontal line to separate content',
    properties: { thickness: '1', color: '#e5e7eb' },
    styles: { margin: '16px 0' },
  }),
];

export function createStandardRegistry(): WidgetRegistry {
  return createWidgetRegistry(standardWidgets);
}
