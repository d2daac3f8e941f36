export type SourceStateName = 'ready' | 'no-images';

export type SourceSubState = 'not-connected';

export interface SourceState {
  state: SourceStateName;
  subState?: SourceSubState;
}

export type MessageLevel = 'SUCCESS' | 'WARNING' | 'ERROR';

export interface SourceMessage {
  level: MessageLevel;
  message: string;
  link: string | null;
}

/**
 * Where the content tree comes from.
 * `usb`: a removable device mounted under mountRoot.
 * `directory`: a directory that is already present, used as-is.
 */
export type ContentSource =
  | { kind: 'usb'; mountRoot: string }
  | { kind: 'directory'; contentRoot: string };
