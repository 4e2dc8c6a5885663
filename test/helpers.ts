import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { HeaderTemplate } from '../src/models/headerTemplate';

/**
 * Error a promise rejects with, or undefined when it resolves
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

export function inlineTemplate(content: string, id: string = 'inline'): HeaderTemplate {
  return { id, name: id, content, source: 'inline' };
}

const trees: string[] = [];

/**
 * Create a temporary directory holding the given files.
 * Call removeTrees from an after hook to delete it again.
 */
export function makeTree(files: Record<string, string>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'license-stamp-'));
  trees.push(root);
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf8');
  }
  return root;
}

export function readTree(root: string, relativePath: string): string {
  return fs.readFileSync(path.join(root, relativePath), 'utf8');
}

/**
 * Delete every directory made by makeTree so far
 */
export function removeTrees(): void {
  for (const root of trees.splice(0)) {
    fs.rmSync(root, { recursive: true, force: true });
  }
}
