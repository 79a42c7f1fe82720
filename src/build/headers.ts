/**
 * Generated file headers
 */

import { PROJECT_NAME } from "../constants";

/**
 * Comment block at the top of every generated YAML or .env file
 *
 * @param from - Project-relative path of the file it was generated from
 */
export function generatedHeader(title: string, from: string): string {
  return (
    `# ${title}\n` +
    `#\n` +
    `# Auto-generated from ${from} by \`${PROJECT_NAME} build\`. DO NOT EDIT!\n` +
    `#\n`
  );
}
