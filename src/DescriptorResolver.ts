import { TargetConfig,
         ResolvedTargetConfig,
         resolve_target_config,
         in_target }             from "./TargetConfig"
import GenerationPlan,
     { FileInvocation }          from "./GenerationPlan"
import { BuildSettings }         from "./BuildSettings"
import { parse_label,
         label_str,
         with_toolchain }        from "./Label"
import { join_source,
         rebase_path,
         source_dir,
         source_file_part,
         source_name_part,
         source_root_relative_dir } from "./SourcePath"
import { pu }                    from "./ArrayUtil"
import TargetError               from "./TargetError"
import * as path                 from "path"

/**
 * Computes the arguments and the outputs of protoc invocations for a proto library.
 *
 * Everything here is a pure function of the target and of the build settings: nothing is read or written.
 */
export default
class DescriptorResolver {
    constructor( settings: BuildSettings ) {
        this.settings = settings;
    }

    /** Throws a TargetError if `config` is incomplete or malformed */
    resolve( config: TargetConfig ): GenerationPlan {
        return this.plan_for( resolve_target_config( config ) );
    }

    /** same as resolve, for a config where defaults have already been applied */
    plan_for( rc: ResolvedTargetConfig ): GenerationPlan {
        return in_target( rc.name, () => this._plan_for( rc ) );
    }

    _plan_for( rc: ResolvedTargetConfig ): GenerationPlan {
        const invocations = rc.sources.map( source => this.invocation_for( rc, source ) );

        let deps = [ with_toolchain( this.settings.protoc_label, this.settings.host_toolchain ) ];
        if ( rc.generator_plugin )
            pu( deps, with_toolchain( rc.generator_plugin.label, this.settings.host_toolchain ) );
        pu( deps, ...rc.deps );

        const name = `${ rc.name }_gen`;
        return {
            kind       : "action_foreach",
            name,
            label      : label_str( { dir: rc.dir, name, toolchain: "" } ),
            script     : this.settings.wrapper_script,
            sources    : [ ...rc.sources ],
            invocations,
            outputs    : invocations.reduce( ( outputs, inv ) => outputs.concat( inv.outputs ), new Array<string>() ),
            deps,
            visibility : [ rc.label ],
        };
    }

    /** arguments and outputs for one .proto file */
    invocation_for( rc: ResolvedTargetConfig, source: string ): FileInvocation {
        const s = this.settings, name = source_name_part( source );

        // by default, the directory structure of the sources is kept
        const proto_out_dir = rc.proto_out_dir == null ? source_root_relative_dir( source ) : rc.proto_out_dir;
        const out_dir       = join_source( s.root_gen_dir, proto_out_dir );
        const py_out_dir    = join_source( s.root_out_dir, s.python_out_subdir, proto_out_dir );
        const rel_out_dir   = rebase_path( out_dir, s.root_build_dir );
        check_inside( rc, out_dir, s.root_gen_dir );
        if ( rc.generate_python )
            check_inside( rc, py_out_dir, join_source( s.root_out_dir, s.python_out_subdir ) );

        let args = new Array<string>(), outputs = new Array<string>();
        if ( rc.cc_include )
            args.push( "--include", rc.cc_include, "--protobuf", path.posix.join( rel_out_dir, `${ name }.pb.h` ) );

        args.push(
            "--proto-in-dir" , rebase_path( source_dir( source ), s.root_build_dir ),
            "--proto-in-file", source_file_part( source ),
            "--use-system-protobuf=0",
            // "./" to be sure that the executable is never looked up in PATH
            "--", "./" + rebase_path( this.host_executable( s.protoc_label ), s.root_build_dir ),
        );

        if ( rc.generate_python ) {
            outputs.push( join_source( py_out_dir, `${ name }_pb2.py` ) );
            args.push( "--python_out", rebase_path( py_out_dir, s.root_build_dir ) );
        }

        if ( rc.generate_cc ) {
            outputs.push( join_source( out_dir, `${ name }.pb.cc` ), join_source( out_dir, `${ name }.pb.h` ) );
            args.push( "--cpp_out", rc.cc_generator_options + rel_out_dir );
        }

        const gp = rc.generator_plugin;
        if ( gp ) {
            outputs.push( join_source( out_dir, `${ name }${ gp.suffix }.cc` ), join_source( out_dir, `${ name }${ gp.suffix }.h` ) );
            args.push(
                "--plugin"    , "protoc-gen-plugin=" + rebase_path( this.host_executable( gp.label ), s.root_build_dir ),
                "--plugin_out", gp.options + rel_out_dir,
            );
        }

        return { source, out_dir, py_out_dir, args, outputs };
    }

    /** where the executable of `label` is built by the host toolchain */
    host_executable( label: string ): string {
        return join_source( this.settings.host_root_out_dir, parse_label( label, "//" ).name + this.settings.host_executable_suffix );
    }

    settings: BuildSettings;
}

/** generated files must stay in their root (they are removed by `clean`) */
function check_inside( rc: ResolvedTargetConfig, dir: string, root: string ): void {
    if ( dir != root && ! dir.startsWith( root == "//" ? root : root + "/" ) )
        throw new TargetError( "InvalidPath", rc.name, `'proto_out_dir' leads to '${ dir }', outside of '${ root }'` );
}
