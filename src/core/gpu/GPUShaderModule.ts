/**
 * GPUShaderModule - compilation diagnostics for native shader modules
 */

/** Shader compilation result */
export interface ShaderCompilationResult {
  module: GPUShaderModule;
  compilationInfo?: GPUCompilationInfo;
  hasErrors: boolean;
  hasWarnings: boolean;
  /** Error messages formatted as `label:line:pos: message` */
  errors: string[];
}

/**
 * Collect and log compilation messages of a shader module
 */
export async function inspectShaderModule(
  module: GPUShaderModule,
  label: string,
): Promise<ShaderCompilationResult> {
  let compilationInfo: GPUCompilationInfo | undefined;
  let hasWarnings = false;
  const errors: string[] = [];

  try {
    compilationInfo = await module.getCompilationInfo();
  } catch (err) {
    console.warn(`[GPUShaderModule] Compilation info unavailable for ${label}:`, err);
  }

  for (const message of compilationInfo?.messages ?? []) {
    const location = `${label}:${message.lineNum}:${message.linePos}`;
    if (message.type === 'error') {
      errors.push(`${location}: ${message.message}`);
      console.error(`[Shader Error] ${location}: ${message.message}`);
    } else if (message.type === 'warning') {
      hasWarnings = true;
      console.warn(`[Shader Warning] ${location}: ${message.message}`);
    }
  }

  return {
    module,
    compilationInfo,
    hasErrors: errors.length > 0,
    hasWarnings,
    errors,
  };
}
