/**
 * A single HTML rewrite pass. `apply` must be pure: same input, same output,
 * no I/O. Rules run in a fixed order, each on the previous rule's output.
 */
export interface RewriteRule {
  readonly name: string;
  readonly description: string;
  apply(html: string): string;
}
