/**
 * Contains the events that can be emitted by the NodeMcuCom class.
 */
export enum NodeMcuSerialEvents {
  // default port events
  portOpened = "portOpened",
  portClosed = "portClosed",
  portError = "portError",

  // the interpreter answered the sync marker, payload is the baud rate
  synced = "synced",
}
