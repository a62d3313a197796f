/**
 * certadm - administrative interface to a certificate authority
 *
 * Main entry point of the library
 */

export * from './lib/index.js';
