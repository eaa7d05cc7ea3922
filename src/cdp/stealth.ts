/**
 * Page-initialization script that masks the usual automation fingerprints.
 * Registered with Page.addScriptToEvaluateOnNewDocument so it runs before
 * any page script on every navigation of the attached target.
 */
export const STEALTH_SCRIPT = `(() => {
  Object.defineProperty(navigator, 'webdriver', { get: () => false });

  Object.defineProperty(navigator, 'plugins', {
    get: () => [
      { name: 'Chrome PDF Plugin', filename: 'internal-pdf-viewer', description: 'Portable Document Format', length: 1 },
      { name: 'Native Client', filename: 'internal-nacl-plugin', description: 'Native Client Executable', length: 2 },
    ],
  });

  Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });

  if (!window.chrome) {
    Object.defineProperty(window, 'chrome', { value: {}, writable: true });
  }
  if (!window.chrome.runtime) {
    window.chrome.runtime = {};
  }

  const originalQuery = window.navigator.permissions && window.navigator.permissions.query;
  if (originalQuery) {
    window.navigator.permissions.query = (parameters) =>
      parameters && parameters.name === 'notifications'
        ? Promise.resolve({ state: Notification.permission })
        : originalQuery.call(window.navigator.permissions, parameters);
  }
})();`;
