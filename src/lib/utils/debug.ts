/**
 * Debug logging for certadm
 *
 * Enabled with the DEBUG environment variable:
 *
 * DEBUG=certadm:* - All debug output
 * DEBUG=certadm:interface - Only dispatcher debug
 * DEBUG=certadm:listing - Only listing classifier debug
 * DEBUG=certadm:cli - Only CLI wiring debug
 */

import debug from 'debug';

export const debugInterface = debug('certadm:interface');
export const debugListing = debug('certadm:listing');
export const debugCli = debug('certadm:cli');
