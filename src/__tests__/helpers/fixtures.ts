/**
 * Test Fixtures
 * Reusable test pages
 */

export const SITE = 'https://docs.example.test';

/**
 * A page with known field values
 */
export const articleHtml = `
<!DOCTYPE html>
<html>
<head>
  <title>Savings Accounts</title>
  <meta name="description" content="Open a savings account in minutes.">
</head>
<body>
  <h1>Savings made simple</h1>
  <h2>Why save with us</h2>
  <h2>OK</h2>
  <h3>Interest rates explained</h3>
  <p>Short one.</p>
  <p>Earn interest on every naira you deposit.</p>
  <p>Withdraw at any time without hidden charges.</p>
  <ul>
    <li>No fees</li>
    <li>Instant transfers to any bank</li>
    <li>Mobile and web access</li>
  </ul>
  <a href="/rates">Rates</a>
  <a href="mailto:help@example.test">Mail</a>
</body>
</html>
`;

export function linkPage(title: string, hrefs: string[]): string {
  const anchors = hrefs.map((href) => `<a href="${href}">${href}</a>`).join('\n');
  return `<html><head><title>${title}</title></head><body>
  <p>This page is about ${title} and has enough words.</p>
  ${anchors}
</body></html>`;
}
