import { makeShaderDataDefinitions } from 'webgpu-utils';
import type {
  ReflectedBinding,
  ReflectedBindingKind,
  ShaderCompiler,
  ShaderLanguage,
  ShaderReflection,
} from './types';
import { ShaderError } from './errors';

type BindingDefinitions = Readonly<Record<string, { group: number; binding: number }>>;

/**
 * Default ShaderCompiler: parses WGSL with webgpu-utils and reports every
 * global resource with its (group, binding) location.
 */
export class WgslShaderCompiler implements ShaderCompiler {
  compile(source: string, language: ShaderLanguage, label: string): ShaderReflection {
    if (language !== 'wgsl') {
      throw ShaderError.validation(`[WgslShaderCompiler] ${label}: ${language} sources are not supported`);
    }

    let defs: ReturnType<typeof makeShaderDataDefinitions>;
    try {
      defs = makeShaderDataDefinitions(source);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw ShaderError.validation(`[WgslShaderCompiler] ${label}: ${reason}`, err);
    }

    const bindings: ReflectedBinding[] = [
      ...collect(defs.uniforms, 'uniform-buffer'),
      ...collect(defs.storages, 'storage-buffer'),
      ...collect(defs.textures, 'texture'),
      ...collect(defs.storageTextures, 'storage-texture'),
      ...collect(defs.samplers, 'sampler'),
      ...collect(defs.externalTextures, 'external-texture'),
    ];

    bindings.sort((a, b) => a.group - b.group || a.binding - b.binding);
    return { bindings };
  }
}

function collect(
  definitions: BindingDefinitions | undefined,
  kind: ReflectedBindingKind,
): ReflectedBinding[] {
  if (!definitions) return [];
  return Object.entries(definitions).map(([name, def]) => ({
    name,
    group: def.group,
    binding: def.binding,
    kind,
  }));
}
