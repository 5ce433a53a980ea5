import { read_target_files,
         read_settings_file,
         TargetFile }               from "./TargetFile"
import { BuildSettings,
         make_build_settings }      from "./BuildSettings"
import ArgumentParser,
     { ParsedArgs }                 from "./ArgumentParser"
import ProtoLibrary,
     { ProtoLibraryNodes }          from "./ProtoLibrary"
import CommunicationEnvironment     from "./CommunicationEnvironment"
import { resolve_label }            from "./Label"
import { rebase_path }              from "./SourcePath"
import Cleaner                      from "./Cleaner"
import * as path                    from "path"

export const version = "0.1.0";

/** a declared target, with the file it comes from */
interface Declared extends ProtoLibraryNodes {
    file: TargetFile;
}

/** parse the command line, read the target files, then do what the mission says */
export default
class ParseArgvAndRunMission {
    constructor( com: CommunicationEnvironment, cwd: string, nb_columns = 100 ) {
        this.com        = com;
        this.cwd        = cwd;
        this.nb_columns = nb_columns;
    }

    /** `argv[ 0 ]` is the program name. `done` gets the exit code */
    run( argv: Array<string>, done: ( code: number ) => void ): void {
        const p = this.make_parser( path.basename( argv[ 0 ] || "protoplan", path.extname( argv[ 0 ] || "" ) ) );
        const args = p.parse_args( argv.slice( 1 ), this.cwd );
        this.com.set_verbosity_from( args.flag( 'silent' ), args.flag( 'verbose' ), args.flag( 'very_verbose' ) );
        this.com.framed = args.flag( 'framed' );

        // trivial flags
        if ( args.flag( 'version' )  ) { this.com.info( `${ p.prg_name } version: ${ p.version }` ); if ( ! args.mission ) return done( 0 ); }
        if ( args.error              ) { this.com.error( `Error: ${ args.error }` );                return done( 1 ); }
        if ( args.flag( 'help' )     ) { this.com.info( p.format_help( args, this.nb_columns ) ); return done( 0 ); }
        if ( ! args.mission          ) { this.com.error( 'Please define a mission' );              return done( 1 ); }
        if ( args.mission == "help"  ) { this.com.info( p.format_help( args, this.nb_columns ) ); return done( 0 ); }
        if ( ! args.list( 'target_files' ).length ) { this.com.error( `Mission '${ args.mission }' needs at least one target file` ); return done( 1 ); }

        this.read_settings( args, ( err, settings ) => {
            if ( err || ! settings ) {
                this.com.error( `Error: ${ err ? err.message : "no settings" }` );
                return done( 1 );
            }
            const source_root = args.str( 'source_root', this.cwd );
            read_target_files( args.list( 'target_files' ), this.cwd, source_root, ( err, files ) => {
                if ( err ) {
                    this.com.error( `Error: ${ err.message }` );
                    return done( 1 );
                }
                let declared: Array<Declared>;
                try {
                    declared = this.select( args, this.declare( settings, files ) );
                    this.com.note( `${ declared.length } target(s) from ${ files.length } file(s)` );
                } catch ( e ) {
                    this.com.error( `Error: ${ e instanceof Error ? e.message : String( e ) }` );
                    return done( 1 );
                }
                this.exec_mission( args.mission, settings, source_root, declared, done );
            } );
        } );
    }

    make_parser( prg_name: string ): ArgumentParser {
        const missions = [ 'plan', 'args', 'outputs', 'graph', 'clean' ];

        let p = new ArgumentParser( prg_name, 'declares protoc invocations and compile units for proto libraries', version );
        p.add_argument( [], 'v,version'      , 'Get version number'                                                                    , 'boolean' );
        p.add_argument( [], 'settings'       , 'Yaml file with build settings (values given on the command line take precedence)'      , 'path'    );
        p.add_argument( [], 'source-root'    , "Directory that corresponds to '//' (default: current directory)"                       , 'path'    );
        p.add_argument( [], 'build-dir'      , "Build directory (default: '//out/Default')"                                             );
        p.add_argument( [], 'gen-dir'        , "Root of generated C++ files (default: '<build-dir>/gen')"                               );
        p.add_argument( [], 'out-dir'        , "Output directory of the target toolchain (default: '<build-dir>')"                      );
        p.add_argument( [], 'host-out-dir'   , "Output directory of the host toolchain, where protoc is built (default: '<out-dir>')"   );
        p.add_argument( [], 'host-toolchain' , "Label of the host toolchain"                                                            );
        p.add_argument( [], 'host-exe-suffix', "Suffix of host executables (e.g. '.exe')"                                               );
        p.add_argument( [], 'component-build', 'Components are linked dynamically'                                             , 'boolean' );
        p.add_argument( missions, 'only'     , 'Restrict to the targets that depend on (or are) the given label'                       );
        this.com.decl_additional_options( p );

        p.set_mission_description( 'plan'   , 'display the generation and compile nodes of each target, as json' );
        p.set_mission_description( 'args'   , 'display the command line of each protoc launch' );
        p.set_mission_description( 'outputs', 'display the files generated by protoc' );
        p.set_mission_description( 'graph'  , 'display the declared nodes' );
        p.set_mission_description( 'clean'  , 'remove generated files (source root is given by --source-root)' );
        p.set_mission_description( 'help'   , 'get help, generic, or for a given mission (in [__MISSION_TYPES__])' );

        p.add_positional_argument( missions, 'target-files', 'yaml file(s) with a list of proto libraries. Glob patterns are accepted', 'string*' );
        p.add_positional_argument( [ 'help' ], 'help-args', 'mission(s) to focus on', 'string*' );
        return p;
    }

    /** defaults < settings file < command line */
    read_settings( args: ParsedArgs, cb: ( err: Error | null, settings: BuildSettings | null ) => void ): void {
        const from_cmd_line: Partial<BuildSettings> = {};
        if ( args.str( 'build_dir'       ) ) from_cmd_line.root_build_dir         = args.str( 'build_dir'       );
        if ( args.str( 'gen_dir'         ) ) from_cmd_line.root_gen_dir           = args.str( 'gen_dir'         );
        if ( args.str( 'out_dir'         ) ) from_cmd_line.root_out_dir           = args.str( 'out_dir'         );
        if ( args.str( 'host_out_dir'    ) ) from_cmd_line.host_root_out_dir      = args.str( 'host_out_dir'    );
        if ( args.str( 'host_toolchain'  ) ) from_cmd_line.host_toolchain         = args.str( 'host_toolchain'  );
        if ( args.str( 'host_exe_suffix' ) ) from_cmd_line.host_executable_suffix = args.str( 'host_exe_suffix' );
        if ( args.flag( 'component_build' ) ) from_cmd_line.is_component_build    = true;

        const make = ( from_file: Partial<BuildSettings> ) => {
            let settings: BuildSettings;
            try {
                settings = make_build_settings( Object.assign( {}, from_file, from_cmd_line ) );
            } catch ( e ) {
                return cb( e instanceof Error ? e : new Error( String( e ) ), null );
            }
            cb( null, settings );
        };

        const filename = args.str( 'settings' );
        if ( ! filename )
            return make( {} );
        read_settings_file( filename, ( err, from_file ) => err ? cb( err, null ) : make( from_file ) );
    }

    /** declare all the targets in a new pool. Throws a TargetError if something is wrong */
    declare( settings: BuildSettings, files: Array<TargetFile> ): Array<Declared> {
        const lib = new ProtoLibrary( settings );
        let res = new Array<Declared>();
        for( const file of files )
            for( const target of file.targets )
                res.push( Object.assign( { file }, lib.declare( target ) ) );
        return res;
    }

    /** --only */
    select( args: ParsedArgs, declared: Array<Declared> ): Array<Declared> {
        const only = args.str( 'only' );
        if ( ! only )
            return declared;
        const label = resolve_label( only, "//" );
        return declared.filter( d => d.compile.some_rec( cn => cn.label == label ) || d.plan.deps.indexOf( label ) >= 0 );
    }

    exec_mission( mission: string, settings: BuildSettings, source_root: string, declared: Array<Declared>, done: ( code: number ) => void ): void {
        switch ( mission ) {
            case "plan":
                this.com.info( JSON.stringify( declared.map( d => ( { generation: d.plan, compile: d.unit } ) ), null, 2 ) );
                return done( 0 );
            case "args":
                for( const d of declared )
                    for( const inv of d.plan.invocations )
                        this.com.info( [ rebase_path( d.plan.script, settings.root_build_dir ), ...inv.args ].join( " " ) );
                return done( 0 );
            case "outputs":
                for( const d of declared )
                    for( const output of d.generation.outputs )
                        this.com.info( output );
                return done( 0 );
            case "graph":
                for( const d of declared ) {
                    this.com.info( d.compile.pretty );
                    this.com.note( `  from ${ d.file.filename }` );
                    this.com.detail( `  signature ${ d.compile.signature }` );
                }
                return done( 0 );
            case "clean":
                return new Cleaner( this.com, source_root ).clean( declared.map( d => d.generation ), ( err, removed ) => {
                    if ( err ) {
                        this.com.error( `Error: ${ err.message }` );
                        return done( 1 );
                    }
                    this.com.announcement( `Removed ${ removed.length } generated file(s)` );
                    done( 0 );
                } );
            default:
                this.com.error( `Error: mission '${ mission }' is not handled` );
                return done( 1 );
        }
    }

    com       : CommunicationEnvironment;
    cwd       : string; /** current working directory */
    nb_columns: number; /** in the output terminal */
}
