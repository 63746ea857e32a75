/**
 * Dialog Port
 *
 * Contract between the selection session and whatever draws the menus.
 * A provider shows one request, writes the chosen tag(s) into the result
 * channel using the transport encoding, and reports whether the user
 * accepted or cancelled.
 *
 * Implementations:
 *   - ClackDialogProvider (CLI): @clack/prompts, in process
 *   - ProgramDialogProvider (CLI): external `dialog` / `whiptail` binary
 */

export type DialogMode = 'single' | 'multi' | 'confirm';

export type DialogOutcome = 'ok' | 'cancel';

/** Row/column hints, in terminal cells. */
export interface DialogGeometry {
  height: number;
  width: number;
  listHeight: number;
}

export interface DialogItem {
  tag: string;
  label: string;
  /** Pre-marked in a multi-choice checklist. */
  checked?: boolean;
}

export interface DialogRequest {
  title: string;
  text?: string;
  geometry: DialogGeometry;
  items: DialogItem[];
  mode: DialogMode;
}

export interface DialogResult {
  outcome: DialogOutcome;
  tags: string[];
}

/**
 * Transient resource the chosen tags travel through. Opened right before a
 * dialog is shown, read once, then released.
 */
export interface ResultChannel {
  /** Where the channel lives (a file path for temp-file channels). */
  readonly location: string;
  write(raw: string): Promise<void>;
  /** Read the raw answer. A channel can be read only once. */
  read(): Promise<string>;
  release(): Promise<void>;
}

export interface ResultChannelFactory {
  open(): Promise<ResultChannel>;
  exists(location: string): Promise<boolean>;
}

export interface DialogProvider {
  readonly name: string;
  isAvailable(): Promise<boolean>;
  show(request: DialogRequest, channel: ResultChannel): Promise<DialogOutcome>;
}

export const DEFAULT_GEOMETRY: DialogGeometry = {
  height: 20,
  width: 70,
  listHeight: 12
};

/**
 * Encode chosen tags the way `dialog --checklist` prints them: each tag
 * double-quoted, space separated. Single-choice answers are written bare.
 */
export function encodeDialogTags(tags: string[], mode: DialogMode): string {
  if (mode === 'multi') {
    return tags.map(tag => `"${tag}"`).join(' ');
  }
  return tags[0] ?? '';
}
