export { readFixture, type FixtureName } from './fixtures.js';
export {
  FakeExecutor,
  fixtureResponder,
  type FakeResponse,
  type Responder,
} from './fake-executor.js';
export { createRecordingLogger, type RecordingLogger } from './logger.js';
