export type CameraSettings = {
  width: number;
  height: number;
  framesPerSecond: number;
};

/**
 * Hardware adapter owned by a single camera lifecycle. Every method rejects with a
 * `CameraDriverError` carrying a structured reason.
 */
export interface CameraDriver {
  open(): Promise<void>;
  configure(settings: CameraSettings): Promise<void>;
  captureTestFrame(): Promise<Buffer>;
  start(outputPath: string): Promise<void>;
  stop(): Promise<void>;
  close(): Promise<void>;
}
