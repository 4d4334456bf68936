/**
 * Template Renderer Interface
 * The first name is the page to render; the remaining names are made
 * available to it as partials (layouts, shared fragments).
 */
export interface ITemplateRenderer {
  render(names: readonly string[], data: unknown): Promise<string>;
}
