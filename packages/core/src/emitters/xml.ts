const XML_ATTRIBUTE_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
};

/**
 * Escape a value for a double-quoted XML attribute
 */
export function escapeXmlAttribute(value: string): string {
  return value.replace(/[&<>"]/g, char => XML_ATTRIBUTE_ESCAPES[char] ?? char);
}

/**
 * `<colors:StaticResource>` entry resolving `key` to another resource
 */
export function staticResourceBinding(key: string, resourceKey: string): string {
  return `  <colors:StaticResource x:Key="${escapeXmlAttribute(key)}" ResourceKey="${escapeXmlAttribute(resourceKey)}" />`;
}

/**
 * Frozen `<SolidColorBrush>` entry for a literal color
 */
export function solidColorBinding(key: string, color: string): string {
  return `  <SolidColorBrush x:Key="${escapeXmlAttribute(key)}" Color="${escapeXmlAttribute(color)}" po:Freeze="True" />`;
}
