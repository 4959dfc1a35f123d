// Static bootstrap for the browser: toggles the hidden panel on ?dev=true or Ctrl/Cmd+Shift+J.
// Constant text, so it never affects output determinism and never reads the data block.
export const VIEWER_BOOTSTRAP = `(function () {
  var panel = document.getElementById('joePanel');
  var toggle = document.getElementById('joeToggle');
  if (!panel) return;
  function setActive(on) {
    panel.classList.toggle('visible', on);
    panel.setAttribute('data-active', on ? 'true' : 'false');
    panel.setAttribute('aria-hidden', on ? 'false' : 'true');
  }
  function flip() {
    setActive(!panel.classList.contains('visible'));
  }
  if (toggle) toggle.addEventListener('click', flip);
  if (new URLSearchParams(window.location.search).get('dev') === 'true') setActive(true);
  document.addEventListener('keydown', function (e) {
    if ((e.metaKey || e.ctrlKey) && e.shiftKey && (e.key === 'J' || e.key === 'j')) {
      flip();
      e.preventDefault();
    }
  });
})();`
