/**
 * Builds a page shaped like a MediaWiki article
 * @param title Text of the page title span, or null to leave it out
 * @param body Inner HTML of the content container
 */
export function wikiPage(title: string | null, body: string): string {
  const heading = title === null ? '' : `<h1 id="firstHeading"><span class="mw-page-title-main">${title}</span></h1>`;
  return `<!DOCTYPE html>
<html lang="tr">
  <head><meta charset="UTF-8"><title>${title ?? ''} - Vikipedi</title></head>
  <body>
    ${heading}
    <div id="mw-content-text" class="mw-body-content">
      <div class="mw-content-ltr mw-parser-output" lang="tr" dir="ltr">${body}</div>
    </div>
  </body>
</html>`;
}

/**
 * Article with one paragraph linking to each of the given paths
 */
export function linkingPage(title: string, hrefs: string[]): string {
  const anchors = hrefs.map((href, index) => `<a href="${href}">link ${index + 1}</a>`).join(' ');
  return wikiPage(title, `<p>${title} intro ${anchors}</p>`);
}
