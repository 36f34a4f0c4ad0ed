export type FeedField =
  | { kind: 'missing' }
  | { kind: 'text'; value: string }
  | { kind: 'structured'; content: string; attributes: Readonly<Record<string, string>> };

export const MISSING: FeedField = { kind: 'missing' };

export function fieldText(field: FeedField): string {
  switch (field.kind) {
    case 'missing':
      return '';
    case 'text':
      return field.value;
    case 'structured':
      return field.content;
  }
}

export function fieldAttribute(field: FeedField, name: string): string | undefined {
  return field.kind === 'structured' ? field.attributes[name] : undefined;
}
