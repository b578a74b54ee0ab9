import type { GPUContext } from '../../GPUContext';
import type { ReflectedBinding, ShaderLanguage } from './types';
import type { DefineSet } from './DefineSet';
import type { ShaderReference } from './ShaderReference';
import { inspectShaderModule } from '../../GPUShaderModule';
import { referenceKey } from './ShaderReference';
import { ShaderError } from './errors';

export interface ShaderInit {
  key: string;
  reference: ShaderReference;
  defines: DefineSet;
  source: string;
  language: ShaderLanguage;
  bindings: ReflectedBinding[];
  includes: ShaderReference[];
}

/**
 * A composed and validated shader variant.
 * The native module is created on first use, once per device.
 */
export class Shader {
  readonly key: string;
  readonly reference: ShaderReference;
  readonly defines: DefineSet;
  readonly source: string;
  readonly language: ShaderLanguage;
  readonly bindings: readonly ReflectedBinding[];
  readonly includes: readonly ShaderReference[];

  private bindingsByName: Map<string, ReflectedBinding>;
  private includeKeys: Set<string>;
  private modules = new WeakMap<GPUContext, GPUShaderModule>();

  constructor(init: ShaderInit) {
    this.key = init.key;
    this.reference = init.reference;
    this.defines = init.defines;
    this.source = init.source;
    this.language = init.language;
    this.bindings = init.bindings;
    this.includes = init.includes;

    this.bindingsByName = new Map(init.bindings.map((b) => [b.name, b]));
    this.includeKeys = new Set(init.includes.map(referenceKey));
  }

  /**
   * Reflected binding by variable name
   */
  getBinding(name: string): ReflectedBinding | undefined {
    return this.bindingsByName.get(name);
  }

  /**
   * True when the reference contributed text to this shader
   */
  includesReference(ref: ShaderReference): boolean {
    return this.includeKeys.has(referenceKey(ref));
  }

  /**
   * Native shader module for a device, created lazily
   */
  getShaderModule(ctx: GPUContext): GPUShaderModule {
    let module = this.modules.get(ctx);
    if (!module) {
      module = ctx.createShaderModule(this.source, this.key);
      this.modules.set(ctx, module);
    }
    return module;
  }

  /**
   * Ask the device for compilation messages; fails when it reports errors.
   */
  async checkCompilation(ctx: GPUContext): Promise<void> {
    const result = await inspectShaderModule(this.getShaderModule(ctx), this.key);
    if (result.hasErrors) {
      throw ShaderError.validation(
        `[Shader] ${this.key} failed to compile:\n${result.errors.join('\n')}`,
      );
    }
  }
}
