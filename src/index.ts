export { default as DescriptorResolver } from "./DescriptorResolver"
export { default as ProtoLibrary }       from "./ProtoLibrary"
export { default as Pool }               from "./Pool"
export { default as CompilationNode }    from "./CompilationNode"
export { default as TargetError }        from "./TargetError"
export { make_build_settings }           from "./BuildSettings"
export { resolve_target_config }         from "./TargetConfig"
export { make_compile_unit }             from "./CompileUnit"
export { parse_label,
         label_str,
         resolve_label,
         with_toolchain }                from "./Label"
export { resolve_source,
         join_source,
         rebase_path }                   from "./SourcePath"
export { parse_target_file,
         parse_settings,
         read_target_files }             from "./TargetFile"

export type { default as GenerationPlan,
              FileInvocation }           from "./GenerationPlan"
export type { BuildSettings }            from "./BuildSettings"
export type { TargetConfig,
              PluginConfig,
              ResolvedTargetConfig }     from "./TargetConfig"
export type { CompileUnitSpec }          from "./CompileUnit"
export type { ProtoLibraryNodes }        from "./ProtoLibrary"
export type { TargetErrorKind }          from "./TargetError"
export type { Label }                    from "./Label"
export type { TargetFile }               from "./TargetFile"
