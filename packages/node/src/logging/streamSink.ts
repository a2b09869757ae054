import { type LogSink, formatLogRecord } from "@tether/core";

/**
 * Sink writing one formatted line per record to `stream` (stderr by default).
 */
export function createStreamSink(stream: NodeJS.WritableStream = process.stderr): LogSink {
  return (record) => {
    stream.write(`${formatLogRecord(record)}\n`);
  };
}
