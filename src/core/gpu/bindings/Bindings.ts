import type { GPUContext } from '../GPUContext';
import type { BindingRequest, BindingStats, BindingValue } from './types';
import type { BindingsLayout } from './BindingsLayout';
import type { BindingDeclaration } from './BindingDeclaration';
import type { BindingState } from './BindingState';
import type { BindKey } from './BindKey';
import { BindGroupBuilder } from '../GPUBindGroup';
import { bindKeyOf, createBindingState, releaseBindingState, resolveBinding } from './BindingState';
import { BindingError } from '../shaders/composition/errors';

export interface BindingsOptions {
  /** Label prefix for created bind groups */
  label?: string;
  /** Log every bind group rebuild */
  verbose?: boolean;
}

/**
 * Position of an entry, as returned by `Bindings.lookup()`
 */
export interface BindingHandle {
  readonly group: number;
  readonly index: number;
}

interface BindingEntry {
  name: string;
  binding: number;
  request: BindingRequest;
  /** null while the entry was never bound */
  key: BindKey | null;
  resource: GPUBindingResource | null;
  state: BindingState;
}

interface BindingGroupState {
  index: number;
  layout: GPUBindGroupLayout;
  entries: BindingEntry[];
  bindGroup: GPUBindGroup | null;
  dirty: boolean;
}

/**
 * Runtime binding cache for one BindingsLayout.
 *
 * Each entry remembers the BindKey of the value it was last bound to. A bind
 * group is rebuilt only after an entry in it received a value with a different
 * key; otherwise the cached GPUBindGroup is returned as-is.
 */
export class Bindings {
  private ctx: GPUContext;
  private _layout: BindingsLayout;
  private groups: BindingGroupState[];
  private label: string;
  private verbose: boolean;
  private stats: BindingStats = {
    bindGroupsCreated: 0,
    buffersCreated: 0,
    bufferWrites: 0,
    texturesCreated: 0,
  };

  constructor(ctx: GPUContext, layout: BindingsLayout, options: BindingsOptions = {}) {
    this.ctx = ctx;
    this._layout = layout;
    this.label = options.label ?? layout.label;
    this.verbose = options.verbose ?? false;

    const gpuLayouts = layout.createBindGroupLayouts(ctx);
    this.groups = layout.groups.map((group) => ({
      index: group.index,
      layout: gpuLayouts[group.index],
      entries: group.entries.map((entry) => ({
        name: entry.name,
        binding: entry.binding,
        request: entry.request,
        key: null,
        resource: null,
        state: createBindingState(entry.request),
      })),
      bindGroup: null,
      dirty: true,
    }));
  }

  get layout(): BindingsLayout {
    return this._layout;
  }

  get groupCount(): number {
    return this.groups.length;
  }

  /**
   * Handle of a named entry; undefined when the layout dropped it
   */
  lookup(name: string): BindingHandle | undefined {
    return this._layout.lookup(name);
  }

  /**
   * Bind a value by name.
   *
   * @returns true when the entry changed. Names missing from the layout are ignored.
   */
  update(name: string, value: BindingValue): boolean {
    const handle = this._layout.lookup(name);
    if (!handle) return false;
    return this.updateEntry(handle, value);
  }

  /**
   * Bind a value through a handle from lookup()
   */
  updateEntry(handle: BindingHandle, value: BindingValue): boolean {
    const group = this.groups[handle.group];
    const entry = group?.entries[handle.index];
    if (!entry) {
      throw new BindingError(`[Bindings] Invalid handle (${handle.group}, ${handle.index})`);
    }

    const key = bindKeyOf(value);
    if (entry.key !== null && entry.key === key) {
      return false;
    }

    entry.resource = resolveBinding(this.ctx, entry.name, entry.state, value, this.stats);
    entry.key = key;
    group.dirty = true;
    return true;
  }

  /**
   * Bind every value of a declaration. Each entry compares its own key, so
   * only the entries whose value changed mark their group dirty.
   */
  bind<T>(declaration: BindingDeclaration<T>, value: T): this {
    declaration.bind(value, this);
    return this;
  }

  isBound(name: string): boolean {
    const handle = this._layout.lookup(name);
    return handle !== undefined && this.groups[handle.group].entries[handle.index].key !== null;
  }

  isDirty(group: number): boolean {
    const state = this.groups[group];
    return state === undefined || state.dirty || state.bindGroup === null;
  }

  /**
   * Bind group for one group index, rebuilt only when an entry changed
   */
  materialize(group: number): GPUBindGroup {
    const state = this.groups[group];
    if (!state) {
      throw new BindingError(`[Bindings] ${this.label} has no group ${group}`);
    }

    if (!state.dirty && state.bindGroup) {
      return state.bindGroup;
    }

    const builder = new BindGroupBuilder(`${this.label}-group${group}`);
    for (const entry of state.entries) {
      if (entry.resource === null) {
        throw new BindingError(
          `[Bindings] "${entry.name}" (group ${group}, binding ${entry.binding}) was never bound`,
        );
      }
      builder.resource(entry.binding, entry.resource);
    }

    state.bindGroup = builder.build(this.ctx, state.layout);
    state.dirty = false;
    this.stats.bindGroupsCreated++;

    if (this.verbose) {
      console.log(`[Bindings] Rebuilt ${this.label} group ${group}`);
    }

    return state.bindGroup;
  }

  /**
   * Bind groups for all groups, in index order
   */
  bindGroups(): GPUBindGroup[] {
    return this.groups.map((group) => this.materialize(group.index));
  }

  /**
   * Set every bind group on a pass encoder, starting at `firstGroup`
   */
  setBindGroups(pass: Pick<GPUBindingCommandsMixin, 'setBindGroup'>, firstGroup = 0): void {
    this.bindGroups().forEach((bindGroup, i) => {
      pass.setBindGroup(firstGroup + i, bindGroup);
    });
  }

  /**
   * Get cache statistics.
   */
  getStats(): BindingStats {
    return { ...this.stats };
  }

  /**
   * Release buffers and textures created by the cache
   */
  destroy(): void {
    for (const group of this.groups) {
      for (const entry of group.entries) {
        releaseBindingState(entry.state);
        entry.key = null;
        entry.resource = null;
      }
      group.bindGroup = null;
      group.dirty = true;
    }
  }
}
