/**
 * In-process stand-ins for the agent server, for tests of code built on the SDK.
 * Nothing here spawns a process or opens a socket.
 */
export {
  FakeAgentServer,
  FakeTransport,
  flushIo,
  readString,
  waitFor,
  type FakeMethodHandler,
  type ReceivedEvent,
  type ReceivedRequest,
} from "./test-utils/fake-agent-server.js";
export { FakeChildProcess, createFakeSpawn } from "./test-utils/fake-child-process.js";
