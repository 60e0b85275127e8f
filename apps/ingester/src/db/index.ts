/**
 * FILE PURPOSE: Barrel export for database layer
 */

export { createDatabase } from './connection.js';
export type { Database, DatabaseHandle } from './connection.js';
export { memes } from './schema.js';
export type { Meme, NewMeme } from './schema.js';
