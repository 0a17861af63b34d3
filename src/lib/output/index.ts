export { OutputSink, STDOUT_LABEL, createOutputSink, describeTarget, formatConsoleEntry } from './sink.js';
