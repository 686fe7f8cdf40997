/**
 * Console logging for the analysis stages. Silent in production or with TREATY_LOG=silent.
 */

export const isDev = () => process.env.NODE_ENV !== "production";

export const isSilenced = () => process.env.TREATY_LOG === "silent";

const enabled = () => isDev() && !isSilenced();

export const dlog = (...args: unknown[]) => {
  if (enabled()) console.log(...args);
};

export const dwarn = (...args: unknown[]) => {
  if (enabled()) console.warn(...args);
};

export const derr = (...args: unknown[]) => {
  if (enabled()) console.error(...args);
};
