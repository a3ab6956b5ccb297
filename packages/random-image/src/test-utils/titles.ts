import { makeFileTitle, type FileTitle } from '../title/title.js';

export function requireTitle(name: string): FileTitle {
  const title = makeFileTitle(name);
  if (!title) {
    throw new Error(`Invalid test title: ${name}`);
  }
  return title;
}
