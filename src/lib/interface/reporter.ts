/**
 * Output channels of an administrative action: `out` carries reports and
 * printed certificates, `err` carries diagnostics.
 */
export interface Reporter {
  out(message: string): void;
  err(message: string): void;
}

/** Reporter writing straight to the console, without decoration. */
export const plainReporter: Reporter = {
  out(message) {
    console.log(message);
  },
  err(message) {
    console.error(message);
  },
};
