import type { BindingVisibility } from '../types';
import type {
  BindingRequest,
  BindingValue,
  BufferValue,
  SamplerRequest,
  SamplerValue,
  StorageBufferRequest,
  StorageTextureRequest,
  TextureRequest,
  TextureValue,
  UniformBufferRequest,
} from './types';
import type { Bindings } from './Bindings';
import { BindKey } from './BindKey';
import { bindKeyOf } from './BindingState';

/** Request parameters without name and kind; visibility defaults to 'all' */
type RequestOptions<R extends BindingRequest> = Omit<R, 'name' | 'kind' | 'visibility'> & {
  visibility?: BindingVisibility;
};

interface DeclaredBinding<T> {
  request: BindingRequest;
  get: (value: T) => BindingValue;
}

/**
 * The bindings a type provides: its requests, the BindKey of a value's
 * current state, and how to push that state into a Bindings cache.
 */
export class BindingDeclaration<T> {
  readonly requests: readonly BindingRequest[];
  private entries: readonly DeclaredBinding<T>[];

  constructor(entries: DeclaredBinding<T>[]) {
    this.entries = entries;
    this.requests = entries.map((entry) => entry.request);
  }

  /**
   * Combined key of every binding of a value.
   * Order-insensitive: equal keys do not imply equal bindings.
   */
  bindKey(value: T): BindKey {
    return BindKey.combine(...this.entries.map((entry) => bindKeyOf(entry.get(value))));
  }

  /**
   * Update every binding of a value; names missing from the layout are skipped
   */
  bind(value: T, bindings: Bindings): void {
    for (const entry of this.entries) {
      bindings.update(entry.request.name, entry.get(value));
    }
  }
}

/**
 * Fluent builder for BindingDeclaration
 *
 * @example
 * const bindings = defineBindings<Material>()
 *   .uniform('material', (m) => m.uniformData(), { visibility: 'fragment' })
 *   .texture('base_color_texture', (m) => m.texture, { visibility: 'fragment' })
 *   .build();
 */
export class BindingDeclarationBuilder<T> {
  private entries: DeclaredBinding<T>[] = [];

  uniform(
    name: string,
    get: (value: T) => BufferValue,
    options: RequestOptions<UniformBufferRequest> = {},
  ): this {
    return this.add({ ...options, name, kind: 'uniform-buffer', visibility: options.visibility ?? 'all' }, get);
  }

  storage(
    name: string,
    get: (value: T) => BufferValue,
    options: RequestOptions<StorageBufferRequest> = {},
  ): this {
    return this.add({ ...options, name, kind: 'storage-buffer', visibility: options.visibility ?? 'all' }, get);
  }

  texture(
    name: string,
    get: (value: T) => TextureValue,
    options: RequestOptions<TextureRequest> = {},
  ): this {
    return this.add({ ...options, name, kind: 'texture', visibility: options.visibility ?? 'all' }, get);
  }

  storageTexture(
    name: string,
    get: (value: T) => TextureValue,
    options: RequestOptions<StorageTextureRequest>,
  ): this {
    return this.add(
      { ...options, name, kind: 'storage-texture', visibility: options.visibility ?? 'all' },
      get,
    );
  }

  sampler(
    name: string,
    get: (value: T) => SamplerValue,
    options: RequestOptions<SamplerRequest> = {},
  ): this {
    return this.add({ ...options, name, kind: 'sampler', visibility: options.visibility ?? 'all' }, get);
  }

  build(): BindingDeclaration<T> {
    return new BindingDeclaration([...this.entries]);
  }

  private add(request: BindingRequest, get: (value: T) => BindingValue): this {
    this.entries.push({ request, get });
    return this;
  }
}

export function defineBindings<T>(): BindingDeclarationBuilder<T> {
  return new BindingDeclarationBuilder<T>();
}
