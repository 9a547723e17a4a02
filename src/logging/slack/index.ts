export { createSlackSink, createFetchPost } from './slack-sink';
