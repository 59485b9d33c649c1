import { mkdir, writeFile } from "node:fs/promises";
import { Buffer } from "node:buffer";
import { basename, dirname, extname } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Raised when an export destination does not name an `.html` file. */
export class InvalidOutputNameError extends Error {
  public readonly code = "E-EXPORT-INVALID-NAME";
  public readonly hint = "use a file name ending in .html";
  public readonly details: { name: string };

  constructor(name: string) {
    super(`'${name}' is not a valid html file name`);
    this.name = "InvalidOutputNameError";
    this.details = { name };
  }
}

/** Throws {@link InvalidOutputNameError} unless {@link name} ends in `.html` after a non-empty stem. */
export function assertHtmlFileName(name: string): void {
  const file = basename(name);
  if (extname(file) !== ".html" || file.length <= ".html".length || /\s/.test(file)) {
    throw new InvalidOutputNameError(name);
  }
}

/**
 * Writes a rendered document, creating missing parent directories. Returns
 * the number of bytes written.
 */
export async function writeNetworkHtml(path: string, html: string): Promise<number> {
  assertHtmlFileName(path);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, html, "utf8");
  return Buffer.byteLength(html, "utf8");
}
