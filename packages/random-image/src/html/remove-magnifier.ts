import { JSDOM } from 'jsdom';

const MAGNIFIER_SELECTOR = 'div.magnify';
const XML_DECLARATION = /<\?xml[^?]*\?>/g;

/**
 * Remove the "magnify" overlay the host attaches to thumbnails.
 *
 * The fragment is parsed into a full document so that stray markup is
 * recovered the same way a browser would, then the body is serialized back.
 * XML declarations are dropped; the HTML parser turns them into comments.
 */
export function removeMagnifier(html: string): string {
  const dom = new JSDOM(`<!doctype html><html><head><meta charset="UTF-8"/></head><body>${html}</body></html>`);
  const { document, NodeFilter } = dom.window;

  for (const magnifier of Array.from(document.querySelectorAll(MAGNIFIER_SELECTOR))) {
    magnifier.remove();
  }

  const walker = document.createTreeWalker(document.body, NodeFilter.SHOW_COMMENT);
  const declarations: Node[] = [];
  while (walker.nextNode()) {
    const comment = walker.currentNode;
    if (comment.nodeValue?.startsWith('?xml')) {
      declarations.push(comment);
    }
  }
  for (const declaration of declarations) {
    declaration.parentNode?.removeChild(declaration);
  }

  const serialized = document.body.innerHTML;
  dom.window.close();

  return serialized.replace(XML_DECLARATION, '');
}
