/**
 * HTTP Client module exports
 */

export * from './HttpClient.js';
