/**
 * @accordo/testing
 *
 * Test stand-ins: a recording cursor for statement-level assertions and an
 * in-memory SQLite database for behaviour against a real engine.
 *
 * @example
 * import { RecordingCursor, createTestDatabase } from '@accordo/testing'
 *
 * const cursor = new RecordingCursor().respond('nextval', [{ nextval: 101 }])
 * const database = createTestDatabase()
 */

export {
  RecordingCursor,
  type CursorEvent,
  type SqlMatcher,
  type RowSource
} from './recording-cursor.js'
export { createTestDatabase, type TestDatabase, type TestDatabaseOptions } from './database.js'
