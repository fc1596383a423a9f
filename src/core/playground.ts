// src/core/playground.ts

/**
 * Browser page served on `/`: an editor on the left, the formatted result on
 * the right, and a ruler at the configured line width. Source and width are
 * kept in localStorage between visits.
 */
export function playgroundPage(defaultMaxLineWidth: number): string {
   return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>reflow</title>
<style>
   html, body { margin: 0; height: 100%; }
   main { display: grid; grid-template-columns: 1fr 1fr; height: 100%; }
   textarea, pre { margin: 0; padding: 1rem; font: 14px/1.4 monospace; tab-size: 4; }
   textarea { border: 0; border-right: 1px solid #ccc; resize: none; outline: none; }
   #pretty { position: relative; overflow: auto; }
   #width { position: absolute; top: 0.5rem; right: 0.5rem; width: 4em; }
   #ruler {
      position: absolute; top: 0; bottom: 0; width: 1px; background: #e88;
      left: calc(1rem + var(--line-length));
   }
</style>
</head>
<body>
<main>
   <textarea id="source" spellcheck="false" autofocus></textarea>
   <div id="pretty">
      <input id="width" type="number" min="1" title="line width">
      <pre id="output"></pre>
      <div id="ruler"></div>
   </div>
</main>
<script>
   const source = document.getElementById('source');
   const width = document.getElementById('width');
   const output = document.getElementById('output');

   source.value = localStorage.getItem('code') ?? '';
   width.value = localStorage.getItem('maxLineLength') ?? '${defaultMaxLineWidth}';

   async function update() {
      const code = source.value;
      const maxLineLength = Number(width.value) || ${defaultMaxLineWidth};
      localStorage.setItem('code', code);
      localStorage.setItem('maxLineLength', String(maxLineLength));
      document.documentElement.style.setProperty('--line-length', maxLineLength + 'ch');

      const res = await fetch('/pretty', {
         method: 'POST',
         body: JSON.stringify({ code, maxLineLength }),
      });
      output.textContent = await res.text();
   }

   source.addEventListener('keydown', (event) => {
      if (event.key !== 'Tab') return;
      event.preventDefault();
      source.setRangeText('    ', source.selectionStart, source.selectionEnd, 'end');
      update();
   });
   source.addEventListener('input', update);
   width.addEventListener('input', update);
   update();
</script>
</body>
</html>
`;
}
