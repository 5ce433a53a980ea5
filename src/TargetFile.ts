import { to_source_absolute } from "./SourcePath"
import { BuildSettings }      from "./BuildSettings"
import { TargetConfig }       from "./TargetConfig"
import { pu }                 from "./ArrayUtil"
import TargetError            from "./TargetError"
import * as async             from "async"
import * as yaml              from "js-yaml"
import * as path              from "path"
import * as fs                from "fs"
import glob                   from "glob"
import { z }                  from "zod"

const plugin_schema = z.object( {
    label  : z.string(),
    suffix : z.string().optional(),
    options: z.string().optional(),
} ).strict();

const target_schema = z.object( {
    name                            : z.string(),
    dir                             : z.string().optional(),
    sources                         : z.array( z.string() ).optional(),
    proto_out_dir                   : z.string().optional(),
    generate_python                 : z.boolean().optional(),
    generate_cc                     : z.boolean().optional(),
    cc_generator_options            : z.string().optional(),
    cc_include                      : z.string().optional(),
    generator_plugin                : plugin_schema.optional(),
    deps                            : z.array( z.string() ).optional(),
    component_build_force_source_set: z.boolean().optional(),
    defines                         : z.array( z.string() ).optional(),
    extra_configs                   : z.array( z.string() ).optional(),
    visibility                      : z.array( z.string() ).optional(),
} ).strict();

const target_file_schema = z.object( {
    targets: z.array( target_schema ),
} ).strict();

const settings_schema = z.object( {
    root_build_dir        : z.string().optional(),
    root_gen_dir          : z.string().optional(),
    root_out_dir          : z.string().optional(),
    host_root_out_dir     : z.string().optional(),
    host_toolchain        : z.string().optional(),
    host_executable_suffix: z.string().optional(),
    is_component_build    : z.boolean().optional(),
    protoc_label          : z.string().optional(),
    runtime_label         : z.string().optional(),
    using_proto_config    : z.string().optional(),
    wrapper_script        : z.string().optional(),
    python_out_subdir     : z.string().optional(),
} ).strict();

/** content of a .yaml target description file */
export
interface TargetFile {
    filename: string;
    targets : Array<TargetConfig>; /** with `dir` defined */
}

/** `default_dir` is used for targets without `dir` (normally the directory of the file, relative to the source root) */
export function parse_target_file( content: string, filename: string, default_dir: string ): TargetFile {
    const data = parse_yaml( content, filename, target_file_schema );
    return {
        filename,
        targets: data.targets.map( target => Object.assign( {}, target, { dir: target.dir || default_dir } ) ),
    };
}

/** */
export function parse_settings( content: string, filename: string ): Partial<BuildSettings> {
    return parse_yaml( content, filename, settings_schema );
}

/** `patterns` may be glob patterns (relative to `cwd`). Files are read in the order of the patterns, then alphabetical order */
export function read_target_files( patterns: Array<string>, cwd: string, source_root: string, cb: ( err: Error | null, files: Array<TargetFile> ) => void ): void {
    async.mapSeries<string, Array<string>, Error>( patterns, ( pattern, cb_pattern ) => {
        glob( pattern, { cwd, absolute: true, nodir: true }, ( err, matches ) => {
            if ( err )
                return cb_pattern( err );
            if ( matches.length == 0 )
                return cb_pattern( new TargetError( "InvalidTargetFile", pattern, "no file matches this pattern" ) );
            cb_pattern( null, matches.map( m => path.normalize( m ) ).sort() );
        } );
    }, ( err, lists ) => {
        if ( err )
            return cb( err, [] );
        let filenames = new Array<string>();
        for( const lst of lists || [] )
            pu( filenames, ...( lst || [] ) );

        async.mapSeries<string, TargetFile, Error>( filenames, ( filename, cb_file ) => {
            fs.readFile( filename, "utf8", ( err, content ) => {
                if ( err )
                    return cb_file( err );
                let res: TargetFile;
                try {
                    res = parse_target_file( content, filename, to_source_absolute( path.dirname( filename ), source_root ) );
                } catch ( e ) {
                    return cb_file( e instanceof Error ? e : new Error( String( e ) ) );
                }
                cb_file( null, res );
            } );
        }, ( err, files ) => {
            if ( err )
                return cb( err, [] );
            cb( null, ( files || [] ).filter( ( f ): f is TargetFile => f != undefined ) );
        } );
    } );
}

/** */
export function read_settings_file( filename: string, cb: ( err: Error | null, settings: Partial<BuildSettings> ) => void ): void {
    fs.readFile( filename, "utf8", ( err, content ) => {
        if ( err )
            return cb( err, {} );
        let res: Partial<BuildSettings>;
        try {
            res = parse_settings( content, filename );
        } catch ( e ) {
            return cb( e instanceof Error ? e : new Error( String( e ) ), {} );
        }
        cb( null, res );
    } );
}

function parse_yaml<T extends z.ZodTypeAny>( content: string, filename: string, schema: T ): z.infer<T> {
    let data: unknown;
    try {
        data = yaml.load( content, { filename } );
    } catch ( e ) {
        throw new TargetError( "InvalidTargetFile", filename, String( e ) );
    }

    const res = schema.safeParse( data );
    if ( ! res.success )
        throw new TargetError( "InvalidTargetFile", filename, res.error.issues.map( issue => `${ issue.path.join( "." ) || "(root)" }: ${ issue.message }` ).join( "; " ) );
    return res.data;
}
