/**
 * Analyze Ad Copy Job Export
 *
 * Re-exports the analyze-ad-copy job configuration for CLI discovery.
 *
 * Usage:
 *   npm run dev analyze ads.csv --job analyze-ad-copy --context "ELISA kits"
 */

export { default } from '../analyze-ad-copy/config.js';
