import { resolve_label, label_str } from "./Label"
import { resolve_source }           from "./SourcePath"
import TargetError                  from "./TargetError"

/** protoc plugin, launched in addition to (or instead of) the builtin generators */
export
interface PluginConfig {
    label   : string; /** target of the plugin executable (built for the host) */
    suffix ?: string; /** appended to the name part of the source for the generated files (e.g. ".mojom" => foo.mojom.cc) */
    options?: string; /** prefix of the output dir in --plugin_out. Must end with ':' if not empty */
}

/** Description of a proto library, as written by the user */
export
interface TargetConfig {
    name                             : string;
    dir                             ?: string;              /** source absolute directory of the target. Default: "//" */
    sources                         ?: Array<string>;       /** .proto files, relative to `dir` or source absolute */
    proto_out_dir                   ?: string;              /** relative to root_gen_dir. Default: directory of each source, relative to the source root */
    generate_python                 ?: boolean;             /** default: true */
    generate_cc                     ?: boolean;             /** default: true */
    cc_generator_options            ?: string;              /** prefix of the output dir in --cpp_out. Must end with ':' if not empty */
    cc_include                      ?: string;              /** header to be included in generated C++ files (export macros, ...) */
    generator_plugin                ?: PluginConfig;
    deps                            ?: Array<string>;       /** labels */
    component_build_force_source_set?: boolean;             /** keep the objects unarchived in component builds */
    defines                         ?: Array<string>;
    extra_configs                   ?: Array<string>;
    visibility                      ?: Array<string>;       /** for the compile unit. Default: no restriction */
}

/** TargetConfig with defaults applied, paths and labels made absolute */
export
interface ResolvedTargetConfig {
    name                            : string;
    dir                             : string;
    label                           : string;
    sources                         : Array<string>;
    proto_out_dir                   : string | null;
    generate_python                 : boolean;
    generate_cc                     : boolean;
    cc_generator_options            : string;
    cc_include                      : string;
    generator_plugin                : Required<PluginConfig> | null;
    deps                            : Array<string>;
    component_build_force_source_set: boolean;
    defines                         : Array<string>;
    extra_configs                   : Array<string>;
    visibility                      : Array<string> | null;
}

/** check fields, apply defaults. Throws a TargetError if something is missing or malformed */
export function resolve_target_config( config: TargetConfig ): ResolvedTargetConfig {
    const name = config.name || "";
    if ( ! name )
        throw new TargetError( "MissingRequiredField", "", "a proto library needs a 'name'" );
    if ( /[:/()]/.test( name ) )
        throw new TargetError( "InvalidLabel", name, "characters ':', '/', '(' and ')' are not allowed in target names" );
    const sources = config.sources || [];
    if ( sources.length == 0 )
        throw new TargetError( "MissingRequiredField", name, "'sources' must contain at least one .proto file" );

    return in_target( name, () => {
        const dir = resolve_source( "//", config.dir || "//" );

        let generator_plugin: Required<PluginConfig> | null = null;
        if ( config.generator_plugin ) {
            const gp = config.generator_plugin;
            if ( gp.suffix == undefined )
                throw new TargetError( "MissingDependentField", name, "'generator_plugin.suffix' is needed when a generator plugin is specified" );
            generator_plugin = {
                label  : resolve_label( gp.label, dir ),
                suffix : gp.suffix,
                options: check_options( name, "generator_plugin.options", gp.options || "" ),
            };
        }

        if ( config.proto_out_dir && config.proto_out_dir.startsWith( "/" ) )
            throw new TargetError( "InvalidPath", name, `'proto_out_dir' must be relative to the gen directory (got '${ config.proto_out_dir }')` );

        return {
            name,
            dir,
            label                           : label_str( { dir, name, toolchain: "" } ),
            sources                         : sources.map( source => {
                if ( ! source )
                    throw new TargetError( "InvalidPath", name, "empty source name" );
                return resolve_source( dir, source );
            } ),
            proto_out_dir                   : config.proto_out_dir == undefined ? null : config.proto_out_dir,
            generate_python                 : config.generate_python != false,
            generate_cc                     : config.generate_cc != false,
            cc_generator_options            : check_options( name, "cc_generator_options", config.cc_generator_options || "" ),
            cc_include                      : config.cc_include || "",
            generator_plugin,
            deps                            : ( config.deps || [] ).map( dep => resolve_label( dep, dir ) ),
            component_build_force_source_set: config.component_build_force_source_set || false,
            defines                         : [ ...( config.defines || [] ) ],
            extra_configs                   : [ ...( config.extra_configs || [] ) ],
            visibility                      : config.visibility ? [ ...config.visibility ] : null,
        };
    } );
}

/** options are concatenated with a directory => a non empty string has to end with the ':' separator */
function check_options( name: string, field: string, options: string ): string {
    if ( options && ! options.endsWith( ":" ) )
        throw new TargetError( "MalformedOptionsString", name, `'${ field }' must end with ':' (got '${ options }')` );
    return options;
}

/** add the name of the target to errors thrown by path and label helpers */
export function in_target<T>( name: string, func: () => T ): T {
    try {
        return func();
    } catch ( e ) {
        if ( e instanceof TargetError && ! e.target )
            throw new TargetError( e.kind, name, e.message );
        throw e;
    }
}
