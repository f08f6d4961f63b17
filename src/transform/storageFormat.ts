/**
 * Builders for Confluence storage-format macro markup.
 */

export type MacroParameters = Record<string, string>;

export function macroParameters(params: MacroParameters): string {
  return Object.entries(params)
    .map(([name, value]) => `<ac:parameter ac:name="${name}">${value}</ac:parameter>`)
    .join('');
}

export function structuredMacro(name: string, params: MacroParameters = {}, body = ''): string {
  return `<ac:structured-macro ac:name="${name}">${macroParameters(params)}${body}</ac:structured-macro>`;
}

export function richTextBody(html: string): string {
  return `<ac:rich-text-body>${html}</ac:rich-text-body>`;
}

/**
 * Wrap raw text in CDATA. A literal `]]>` is split across two sections.
 */
export function cdata(text: string): string {
  return `<![CDATA[${text.replace(/]]>/g, ']]]]><![CDATA[>')}]]>`;
}

export function plainTextBody(text: string): string {
  return `<ac:plain-text-body>${cdata(text)}</ac:plain-text-body>`;
}
