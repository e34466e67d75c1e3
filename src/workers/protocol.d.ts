/**
 * IPC protocol between the supervisor and its worker processes.
 */
export namespace protocol {
  /**
   * Error flattened for the IPC channel.
   */
  export interface SerializedError {
    /**
     * Error class name.
     */
    name: string;
    message: string;
    stack?: string;
    /**
     * `ForklineError` code or Node errno code.
     */
    code?: string;
  }

  /**
   * Supervisor -> worker: stop accepting and drain.
   */
  export interface ShutdownMessage {
    type: 'shutdown';
    /**
     * How long in-flight exchanges may run before they are cut off.
     */
    graceMs: number;
  }

  /**
   * Worker -> supervisor: application loaded and listening.
   */
  export interface ReadyMessage {
    type: 'ready';
    port: number;
    address: string;
  }

  /**
   * Worker -> supervisor: the worker cannot serve and is about to exit.
   */
  export interface BootFailedMessage {
    type: 'boot_failed';
    stage: 'load' | 'listen';
    error: SerializedError;
  }

  /**
   * Worker -> supervisor: drain finished, the worker exits next.
   */
  export interface DrainedMessage {
    type: 'drained';
    completed: number;
    forced: number;
  }

  export type SupervisorMessage = ShutdownMessage;

  export type WorkerMessage = ReadyMessage | BootFailedMessage | DrainedMessage;
}
