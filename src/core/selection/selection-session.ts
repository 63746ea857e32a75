/**
 * Interactive selection of packages to install, category by category.
 *
 * CategoryMenu ──category──▶ PackageChecklist ──ok/cancel──▶ CategoryMenu
 * CategoryMenu ──INSTALL───▶ Confirm ──yes──▶ Done
 *                                    └─no───▶ CategoryMenu
 * CategoryMenu ──cancel────▶ Aborted
 */

import type { Category, PackageId, SelectionSet } from '../../types/index.js';
import type { CategoryCatalog } from '../catalog/category-catalog.js';
import {
  DEFAULT_GEOMETRY,
  type DialogGeometry,
  type DialogProvider,
  type DialogRequest,
  type DialogResult,
  type ResultChannelFactory
} from '../ports/dialog.js';
import { sanitizeDialogTags } from './dialog-tags.js';
import { CatalogError, DialogUnavailableError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/** Tag of the "proceed to install" entry in the category menu. */
export const INSTALL_TAG = 'INSTALL';

export type MenuState =
  | { name: 'category-menu' }
  | { name: 'package-checklist'; categoryId: string }
  | { name: 'confirm' }
  | { name: 'done' }
  | { name: 'aborted' };

export type SessionResult =
  | { state: 'done'; selection: SelectionSet }
  | { state: 'aborted' };

export interface SelectionSessionOptions {
  catalog: CategoryCatalog;
  dialog: DialogProvider;
  channels: ResultChannelFactory;
  geometry?: DialogGeometry;
}

export class SelectionSession {
  private readonly catalog: CategoryCatalog;
  private readonly dialog: DialogProvider;
  private readonly channels: ResultChannelFactory;
  private readonly geometry: DialogGeometry;
  private readonly selection: SelectionSet = new Map();
  private readonly history: MenuState[] = [];

  constructor(options: SelectionSessionOptions) {
    if (options.catalog.has(INSTALL_TAG)) {
      throw new CatalogError(`'${INSTALL_TAG}' is reserved and cannot be a category id`);
    }
    this.catalog = options.catalog;
    this.dialog = options.dialog;
    this.channels = options.channels;
    this.geometry = options.geometry ?? DEFAULT_GEOMETRY;
  }

  /** Every state entered so far, in order. */
  get transitions(): readonly MenuState[] {
    return this.history;
  }

  async run(): Promise<SessionResult> {
    if (!(await this.dialog.isAvailable())) {
      throw new DialogUnavailableError(this.dialog.name);
    }

    let state: MenuState = { name: 'category-menu' };
    this.enter(state);

    while (state.name !== 'done' && state.name !== 'aborted') {
      state = await this.step(state);
      this.enter(state);
    }

    return state.name === 'done'
      ? { state: 'done', selection: this.snapshot() }
      : { state: 'aborted' };
  }

  private async step(state: MenuState): Promise<MenuState> {
    switch (state.name) {
      case 'category-menu':
        return this.showCategoryMenu();
      case 'package-checklist':
        return this.showChecklist(state.categoryId);
      case 'confirm':
        return this.showConfirm();
      default:
        return state;
    }
  }

  private async showCategoryMenu(): Promise<MenuState> {
    const categories = this.catalog.categories();
    const result = await this.ask({
      title: 'Package categories',
      text: 'Choose a category to pick packages from, or INSTALL to continue.',
      geometry: this.geometry,
      mode: 'single',
      items: [
        ...categories.map(category => ({
          tag: category.id,
          label: `${this.chosen(category.id).length}/${category.packages.length} selected`
        })),
        { tag: INSTALL_TAG, label: 'Proceed to install' }
      ]
    });

    if (result.outcome === 'cancel') {
      return { name: 'aborted' };
    }

    const [tag] = result.tags;
    if (tag === INSTALL_TAG) {
      return { name: 'confirm' };
    }
    if (tag !== undefined && this.catalog.has(tag)) {
      return { name: 'package-checklist', categoryId: tag };
    }

    logger.debug('Ignoring unknown category menu answer', { tags: result.tags });
    return { name: 'category-menu' };
  }

  private async showChecklist(categoryId: string): Promise<MenuState> {
    const category = this.catalog.get(categoryId);
    if (!category) {
      return { name: 'category-menu' };
    }

    const previous = new Set(this.chosen(categoryId));
    const result = await this.ask({
      title: `Category: ${category.id}`,
      text: 'Select the packages to install.',
      geometry: this.geometry,
      mode: 'multi',
      items: category.packages.map(pkg => ({ tag: pkg, label: pkg, checked: previous.has(pkg) }))
    });

    if (result.outcome === 'ok') {
      this.selection.set(category.id, pickPackages(category, result.tags));
    }
    return { name: 'category-menu' };
  }

  private async showConfirm(): Promise<MenuState> {
    const lines: string[] = [];
    let total = 0;
    for (const category of this.catalog.categories()) {
      const chosen = this.chosen(category.id);
      if (chosen.length > 0) {
        total += chosen.length;
        lines.push(`${category.id}: ${chosen.join(' ')}`);
      }
    }

    const summary = total === 0
      ? 'No packages selected.'
      : `Install ${total} package(s)?\n\n${lines.join('\n')}`;

    const result = await this.ask({
      title: 'Confirm installation',
      text: summary,
      geometry: this.geometry,
      mode: 'confirm',
      items: []
    });

    return result.outcome === 'ok' ? { name: 'done' } : { name: 'category-menu' };
  }

  /**
   * Show one dialog through a fresh result channel. The channel is read once
   * and released whatever happens; a release failure after a dialog failure
   * is logged.
   */
  private async ask(request: DialogRequest): Promise<DialogResult> {
    const channel = await this.channels.open();
    let result: DialogResult;
    try {
      const outcome = await this.dialog.show(request, channel);
      const raw = await channel.read();
      result = {
        outcome,
        tags: outcome === 'ok' ? sanitizeDialogTags(raw, request.mode) : []
      };
    } catch (error) {
      // Surface the dialog failure, not a cleanup failure behind it
      try {
        await channel.release();
      } catch (releaseError) {
        logger.warn(`Failed to release dialog result channel ${channel.location}`, releaseError);
      }
      throw error;
    }
    await channel.release();
    return result;
  }

  private chosen(categoryId: string): PackageId[] {
    return this.selection.get(categoryId) ?? [];
  }

  private enter(state: MenuState): void {
    logger.debug(`Selection session: ${state.name}`);
    this.history.push(state);
  }

  private snapshot(): SelectionSet {
    return new Map([...this.selection].map(([id, packages]) => [id, [...packages]]));
  }
}

/**
 * Keep only tags naming packages of the category, in catalog order.
 */
function pickPackages(category: Category, tags: string[]): PackageId[] {
  const wanted = new Set(tags);
  const unknown = tags.filter(tag => !category.packages.includes(tag));
  if (unknown.length > 0) {
    logger.debug(`Ignoring unknown packages for category '${category.id}'`, { unknown });
  }
  return category.packages.filter(pkg => wanted.has(pkg));
}
