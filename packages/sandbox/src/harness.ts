export const EXECUTION_ERROR_MARKER = 'EXECUTION_ERROR:';

export const MISSING_ENTRY_POINT_MESSAGE = 'No scrape(url) entry point is defined';

const buildHarness = (testUrl: string): string => `
// --- sandbox harness ---
;(function () {
  var __sandboxEntry =
    typeof scrape === 'function'
      ? scrape
      : module.exports && typeof module.exports.scrape === 'function'
        ? module.exports.scrape
        : typeof module.exports === 'function'
          ? module.exports
          : undefined;

  if (typeof __sandboxEntry !== 'function') {
    process.stderr.write(${JSON.stringify(`${MISSING_ENTRY_POINT_MESSAGE}\n`)}, function () {
      process.exit(1);
    });
    return;
  }

  var __sandboxFinish = function (text) {
    process.stdout.write(text + '\\n', function () {
      process.exit(0);
    });
  };

  Promise.resolve()
    .then(function () {
      return __sandboxEntry(${JSON.stringify(testUrl)});
    })
    .then(function (result) {
      if (result === null || typeof result !== 'object' || Array.isArray(result)) {
        var kind = result === null ? 'null' : Array.isArray(result) ? 'array' : typeof result;
        throw new Error('scrape() must return an object of fields, got ' + kind);
      }
      return JSON.stringify(result, null, 2);
    })
    .then(__sandboxFinish, function (error) {
      var message = error && error.message ? error.message : String(error);
      __sandboxFinish(${JSON.stringify(EXECUTION_ERROR_MARKER)} + ' ' + message);
    });
})();
`;

/**
 * Appends the harness that calls the entry point with `testUrl` and prints either the
 * JSON of its result or an {@link EXECUTION_ERROR_MARKER} line. A missing entry point
 * exits non-zero without the marker.
 */
export const wrapWithHarness = (code: string, testUrl: string): string => `${code}\n${buildHarness(testUrl)}`;
