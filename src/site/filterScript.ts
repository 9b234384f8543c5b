// Runs in the browser. Toggles body rows on each keystroke by substring match.
export const FILTER_SCRIPT = `(function() {
    const q = document.getElementById('q');
    const tbody = document.querySelector('#tbl tbody');
    const rows = Array.from(tbody.querySelectorAll('tr'));

    rows.forEach(r => r.setAttribute('tabindex', '0'));

    q.addEventListener('input', () => {
      const needle = q.value.trim().toLowerCase();
      for (const tr of rows) {
        const hit = tr.innerText.toLowerCase().includes(needle);
        tr.style.display = hit ? '' : 'none';
        tr.setAttribute('aria-hidden', hit ? 'false' : 'true');
      }
    });
  })();`;
