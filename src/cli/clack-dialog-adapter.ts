/**
 * Clack Dialog Adapter
 *
 * DialogProvider drawn in process with @clack/prompts. Cancellation
 * (Ctrl-C / Esc) is reported as a `cancel` outcome, not thrown, because the
 * selection session treats it as a state transition.
 */

import * as clack from '@clack/prompts';

import {
  encodeDialogTags,
  type DialogOutcome,
  type DialogProvider,
  type DialogRequest,
  type ResultChannel
} from '../core/ports/dialog.js';

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(): boolean {
  const isTTY = process.stdin.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

export function createClackDialog(interactive: () => boolean = detectInteractive): DialogProvider {
  return {
    name: 'clack',

    async isAvailable(): Promise<boolean> {
      return interactive();
    },

    async show(request: DialogRequest, channel: ResultChannel): Promise<DialogOutcome> {
      const message = request.text ? `${request.title} - ${request.text}` : request.title;

      switch (request.mode) {
        case 'single': {
          const result = await clack.select({
            message,
            options: request.items.map(item => ({ value: item.tag, label: item.tag, hint: item.label })),
            maxItems: request.geometry.listHeight,
          });
          if (clack.isCancel(result)) {
            return 'cancel';
          }
          await channel.write(encodeDialogTags([result], 'single'));
          return 'ok';
        }

        case 'multi': {
          const result = await clack.multiselect({
            message,
            options: request.items.map(item => ({ value: item.tag, label: item.label })),
            initialValues: request.items.filter(item => item.checked).map(item => item.tag),
            required: false,
          });
          if (clack.isCancel(result)) {
            return 'cancel';
          }
          await channel.write(encodeDialogTags(result, 'multi'));
          return 'ok';
        }

        case 'confirm': {
          if (request.text) {
            clack.note(request.text, request.title);
          }
          const result = await clack.confirm({ message: 'Continue?', initialValue: true });
          if (clack.isCancel(result) || !result) {
            return 'cancel';
          }
          return 'ok';
        }
      }
    },
  };
}
