/** Exit code: configuration error (bad flags, missing or invalid interface, unknown step). */
export const EXIT_CONFIG = 1;
/** Exit code: runtime fatal error (sink or pipe I/O, capture routine failure). */
export const EXIT_RUNTIME = 2;

/** Flag names of the extcap calling convention. */
export const FLAGS = {
  VERSION: 'extcap-version',
  INTERFACES: 'extcap-interfaces',
  INTERFACE: 'extcap-interface',
  DLTS: 'extcap-dlts',
  CONFIG: 'extcap-config',
  RELOAD_OPTION: 'extcap-reload-option',
  CAPTURE: 'capture',
  CAPTURE_FILTER: 'extcap-capture-filter',
  FIFO: 'fifo',
  CONTROL_IN: 'extcap-control-in',
  CONTROL_OUT: 'extcap-control-out',
  DEBUG: 'debug',
  DEBUG_FILE: 'debug-file',
  HELP: 'help',
  SHOW_VERSION: 'version',
} as const;

/** LINKTYPE_USER0; used when an interface does not name its own link type. */
export const DLT_USER0 = 147;

export const MAX_LINK_TYPE = 0xffff_ffff;
export const DEFAULT_SNAP_LENGTH = 65_535;

/** Capacity of each control-pipe message queue. */
export const CONTROL_QUEUE_CAPACITY = 128;

/** Control pipe framing. */
export const CONTROL_SYNC_BYTE = 0x54; // 'T'
export const CONTROL_HEADER_LENGTH = 4;
export const CONTROL_SUBHEADER_LENGTH = 2;
export const MAX_CONTROL_FRAME_LENGTH = 0xff_ffff;
export const MAX_CONTROLS = 256;

/** fifo value meaning "write the capture to standard output". */
export const STDOUT_FIFO = '-';
