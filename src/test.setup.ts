// Shared test setup for Vitest
// Suppress React act warnings in jsdom environment
// See: https://react.dev/reference/react/StrictMode#turn-off-warning-about-not-wrapping-updates-in-act
declare global {
  // eslint-disable-next-line no-var
  var IS_REACT_ACT_ENVIRONMENT: boolean | undefined;
}

globalThis.IS_REACT_ACT_ENVIRONMENT = true;

export {};
