/**
 * Fragment relay page
 *
 * The provider returns the ID token in the URL fragment, which browsers never
 * send to the server. The callback answers GET with this page; its script
 * reads `id_token` from `location.hash` and POSTs it back to the callback.
 */

export function renderRelayPage(callbackPath: string): string {
  const action = JSON.stringify(callbackPath).replace(/</g, '\\u003c')
  return `<!DOCTYPE html>
<html><body><script>
const fragment = new URLSearchParams(window.location.hash.slice(1));
const form = document.createElement('form');
form.method = 'POST';
form.action = ${action};
const input = document.createElement('input');
input.type = 'hidden';
input.name = 'id_token';
input.value = fragment.get('id_token') || '';
form.appendChild(input);
document.body.appendChild(form);
form.submit();
</script></body></html>`
}
