export { BindKey } from './BindKey';
export { Bindings } from './Bindings';
export type { BindingsOptions, BindingHandle } from './Bindings';
export { BindingsLayout, BindingsLayoutBuilder } from './BindingsLayout';
export type { LayoutEntryInfo, LayoutGroup, ReflectionSource, RequestSource } from './BindingsLayout';
export { BindingDeclaration, BindingDeclarationBuilder, defineBindings } from './BindingDeclaration';
export { bindKeyOf } from './BindingState';
export { applyOverride, requestToLayoutEntry } from './types';
export type {
  BindingKind,
  BindingRequest,
  UniformBufferRequest,
  StorageBufferRequest,
  TextureRequest,
  StorageTextureRequest,
  SamplerRequest,
  BindingOverride,
  BindingValue,
  BufferValue,
  TextureValue,
  SamplerValue,
  BindingStats,
} from './types';
