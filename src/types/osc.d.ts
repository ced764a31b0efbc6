declare module 'osc' {
  interface OSCArgument {
    type: string;
    value: unknown;
  }

  interface OSCMessage {
    address: string;
    args: OSCArgument[];
  }

  interface OSCReadOptions {
    metadata?: boolean;
    unpackSingleArgs?: boolean;
  }

  /** Write an OSC message to a Buffer */
  function writeMessage(msg: OSCMessage): Uint8Array;

  /** Read an OSC message from a Buffer */
  function readMessage(data: Buffer | Uint8Array, options?: OSCReadOptions): OSCMessage;

  export { OSCArgument, OSCMessage, OSCReadOptions, writeMessage, readMessage };
}
