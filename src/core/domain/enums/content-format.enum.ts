/**
 * Text formats the content parser understands
 */
export enum ContentFormat {
  PLAIN = 'text',
  MARKDOWN = 'markdown',
  HTML = 'html',
}
