import type { GPUContext } from '../GPUContext';
import type { BindingLocation } from '../types';
import type { ReflectedBinding } from '../shaders/composition/types';
import type { BindingOverride, BindingRequest } from './types';
import type { BindingsOptions } from './Bindings';
import { BindGroupLayoutBuilder } from '../GPUBindGroup';
import { ShaderError } from '../shaders/composition/errors';
import { Bindings } from './Bindings';
import { applyOverride, requestToLayoutEntry } from './types';

/**
 * A request matched to its reflected location
 */
export interface LayoutEntryInfo {
  name: string;
  group: number;
  binding: number;
  request: BindingRequest;
}

export interface LayoutGroup {
  index: number;
  /** Entries ordered by binding index */
  entries: LayoutEntryInfo[];
}

/**
 * Anything exposing reflected bindings (a Shader, or a hand-written list)
 */
export interface ReflectionSource {
  readonly bindings: readonly ReflectedBinding[];
  readonly key?: string;
}

/**
 * Anything exposing binding requests (a BindingDeclaration, or a hand-written list)
 */
export interface RequestSource {
  readonly requests: readonly BindingRequest[];
}

interface ReflectedLocation extends ReflectedBinding {
  source: string;
}

function describeLocation(location: BindingLocation): string {
  return `group(${location.group}) binding(${location.binding})`;
}

/**
 * Builder collecting shaders, requests and overrides for a BindingsLayout
 */
export class BindingsLayoutBuilder {
  private shaders: ReflectionSource[] = [];
  private requests: BindingRequest[] = [];
  private overrides = new Map<string, BindingOverride>();
  private label: string;

  constructor(label = 'bindings') {
    this.label = label;
  }

  /**
   * Add the reflection of one shader stage
   */
  withShader(shader: ReflectionSource): this {
    this.shaders.push(shader);
    return this;
  }

  /**
   * Add every request of a declaration
   */
  bind(source: RequestSource): this {
    this.requests.push(...source.requests);
    return this;
  }

  /**
   * Add a single request
   */
  request(request: BindingRequest): this {
    this.requests.push(request);
    return this;
  }

  /**
   * Replace kind-specific parameters of the request with this name
   */
  override(name: string, params: BindingOverride): this {
    this.overrides.set(name, { ...this.overrides.get(name), ...params });
    return this;
  }

  /**
   * Match requests against the merged reflection.
   * Requests whose name no shader declares are dropped.
   */
  build(): BindingsLayout {
    const reflected = this.mergeReflection();

    const matched: LayoutEntryInfo[] = [];
    const seen = new Set<string>();
    const occupied = new Map<string, string>();

    for (const declared of this.requests) {
      if (seen.has(declared.name)) {
        console.warn(`[BindingsLayout] Duplicate request "${declared.name}" ignored`);
        continue;
      }
      seen.add(declared.name);

      const location = reflected.get(declared.name);
      if (!location) continue;

      const override = this.overrides.get(declared.name);
      const request = override ? applyOverride(declared, override) : declared;

      if (request.kind !== location.kind) {
        throw new ShaderError(
          'BindingMismatch',
          `Binding "${request.name}" is requested as ${request.kind} but declared as ${location.kind} in ${location.source}`,
        );
      }

      const slot = describeLocation(location);
      const other = occupied.get(slot);
      if (other !== undefined) {
        throw new ShaderError(
          'BindingMismatch',
          `Bindings "${other}" and "${request.name}" are both declared at ${slot}`,
        );
      }
      occupied.set(slot, request.name);

      matched.push({ name: request.name, group: location.group, binding: location.binding, request });
    }

    for (const location of reflected.values()) {
      if (!seen.has(location.name)) {
        console.warn(
          `[BindingsLayout] "${location.name}" at ${describeLocation(location)} has no binding request`,
        );
      }
    }

    const groupCount = matched.reduce((count, entry) => Math.max(count, entry.group + 1), 0);
    const groups: LayoutGroup[] = Array.from({ length: groupCount }, (_, index) => ({
      index,
      entries: matched.filter((entry) => entry.group === index).sort((a, b) => a.binding - b.binding),
    }));

    return new BindingsLayout(groups, this.label);
  }

  private mergeReflection(): Map<string, ReflectedLocation> {
    const reflected = new Map<string, ReflectedLocation>();

    this.shaders.forEach((shader, i) => {
      const source = shader.key ?? `shader #${i}`;
      for (const binding of shader.bindings) {
        const existing = reflected.get(binding.name);
        if (!existing) {
          reflected.set(binding.name, { ...binding, source });
          continue;
        }
        if (existing.group !== binding.group || existing.binding !== binding.binding) {
          throw ShaderError.bindingMismatch(
            binding.name,
            `${describeLocation(existing)} (${existing.source})`,
            `${describeLocation(binding)} (${source})`,
          );
        }
      }
    });

    return reflected;
  }
}

/**
 * Matched binding requests grouped by bind group index.
 * Groups are dense from 0; a group without entries gets an empty layout.
 */
export class BindingsLayout {
  readonly groups: readonly LayoutGroup[];
  readonly label: string;
  private locations = new Map<string, { group: number; index: number }>();
  private gpuLayouts = new WeakMap<GPUContext, GPUBindGroupLayout[]>();
  private pipelineLayouts = new WeakMap<GPUContext, GPUPipelineLayout>();

  constructor(groups: LayoutGroup[], label = 'bindings') {
    this.groups = groups;
    this.label = label;

    for (const group of groups) {
      group.entries.forEach((entry, index) => {
        this.locations.set(entry.name, { group: group.index, index });
      });
    }
  }

  static builder(label?: string): BindingsLayoutBuilder {
    return new BindingsLayoutBuilder(label);
  }

  has(name: string): boolean {
    return this.locations.has(name);
  }

  /**
   * Position of a named entry: its group and its index within that group's entries
   */
  lookup(name: string): { group: number; index: number } | undefined {
    return this.locations.get(name);
  }

  /**
   * Shader location of a named entry
   */
  location(name: string): BindingLocation | undefined {
    const position = this.locations.get(name);
    if (!position) return undefined;
    const entry = this.groups[position.group].entries[position.index];
    return { group: entry.group, binding: entry.binding };
  }

  get entryCount(): number {
    return this.locations.size;
  }

  /**
   * Native bind group layouts, one per group (memoized per context)
   */
  createBindGroupLayouts(ctx: GPUContext): GPUBindGroupLayout[] {
    let layouts = this.gpuLayouts.get(ctx);
    if (!layouts) {
      layouts = this.groups.map((group) => {
        const builder = new BindGroupLayoutBuilder(`${this.label}-group${group.index}-layout`);
        for (const entry of group.entries) {
          builder.entry(entry.binding, entry.request.visibility, requestToLayoutEntry(entry.request));
        }
        return builder.build(ctx);
      });
      this.gpuLayouts.set(ctx, layouts);
    }
    return layouts;
  }

  /**
   * Native pipeline layout over all groups (memoized per context)
   */
  createPipelineLayout(ctx: GPUContext): GPUPipelineLayout {
    let layout = this.pipelineLayouts.get(ctx);
    if (!layout) {
      layout = ctx.device.createPipelineLayout({
        label: `${this.label}-pipeline-layout`,
        bindGroupLayouts: this.createBindGroupLayouts(ctx),
      });
      this.pipelineLayouts.set(ctx, layout);
    }
    return layout;
  }

  /**
   * Runtime binding cache for this layout
   */
  createBindings(ctx: GPUContext, options: BindingsOptions = {}): Bindings {
    return new Bindings(ctx, this, options);
  }
}
