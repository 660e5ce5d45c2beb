import process from 'node:process';
import { readFile, writeFile } from 'node:fs/promises';

import { convertHtmlExport, renderJsonl, renderMarkdown } from '../../export/htmlConverter.js';
import { reportStartupError } from '../../runtime/startupErrors.js';

// Usage: convert:html [input.html] [output.md] [output.jsonl]
const run = async () => {
  const [input = 'messages.html', markdownPath = 'messages.md', jsonlPath = 'messages.jsonl'] = process.argv.slice(2);

  const items = convertHtmlExport(await readFile(input, 'utf8'));
  await writeFile(markdownPath, renderMarkdown(items), 'utf8');
  await writeFile(jsonlPath, renderJsonl(items), 'utf8');

  console.log(`Сообщений: ${items.length}`);
  console.log(`- ${markdownPath}`);
  console.log(`- ${jsonlPath}`);
};

run().catch((err) => {
  reportStartupError(err, { mode: 'convert-html' });
  process.exit(1);
});
