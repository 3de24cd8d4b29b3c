/**
 * Custom SMS Sender Module Entry Point
 *
 * Exports all SMS-related services and types.
 */

export * from './sms.types';
export * from './sms.errors';
export * from './sms.validator';
export * from './sms.formatter';
export * from './code-decryptor.service';
export * from './lox24.client';
export * from './sms.service';
export { handler, healthCheck } from './sms.lambda';
