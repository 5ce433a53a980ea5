import * as path from "path";

/** */
export declare type ArgumentType = 'boolean' | 'string' | 'string*' | 'path';

/** */
export declare type ArgValue = boolean | string | Array<string>;

/** */
interface Argument {
    short   : string;
    long    : string;
    help    : string;
    type    : ArgumentType;
    missions: Array<string>; /** Missions that use this argument (empty => all) */
}

/** */
interface PositionalArgument {
    name: string;
    help: string;
    type: ArgumentType;
}

/** result of ArgumentParser.parse_args. Attribute names are the long names, with '-' replaced by '_' */
export
class ParsedArgs {
    flag( name: string ): boolean {
        return this.values.get( name ) === true;
    }

    str( name: string, default_value = "" ): string {
        const val = this.values.get( name );
        return typeof val == "string" ? val : default_value;
    }

    list( name: string ): Array<string> {
        const val = this.values.get( name );
        return Array.isArray( val ) ? val : [];
    }

    mission = "";
    error   = "";                        /** not empty if something went wrong */
    values  = new Map<string,ArgValue>();
}

/** Small utility for argument parsing with one level of subparsing (the mission) */
export default
class ArgumentParser {
    constructor( prg_name: string, description: string, version: string ) {
        this.prg_name    = prg_name   ;
        this.description = description;
        this.version     = version    ;

        this.add_argument( [], 'h,help', `Get this help message. '${ prg_name } --help {__MISSION_TYPES__}' to get information for a given mission`, 'boolean' );
    }

    /** */
    set_mission_description( mission: string, description: string ): void {
        this.missions.set( mission, description );
    }

    /** add an argument for a given list of missions (or all of them if `missions` is empty). names = 'short,long' or 'long' */
    add_argument( missions: Array<string>, names: string, help: string, type: ArgumentType = 'string' ): void {
        const short = names.split( ',' ).find( x => x.length == 1 ) || "";
        const long  = names.split( ',' ).find( x => x.length >  1 ) || "";
        const old = this.args.find( arg => ( short && arg.short == short ) || ( long && arg.long == long ) );
        if ( old ) {
            if ( old.short != short || old.long != long || old.type != type )
                throw new Error( `Argument '${ names }' is declared several times, with different names or types` );
            old.missions.push( ...missions );
            return;
        }
        this.args.push( { short, long, missions: [ ...missions ], help, type } );
    }

    /**  */
    add_positional_argument( missions: Array<string>, name: string, help: string, type: ArgumentType = 'string' ): void {
        for( const m of missions ) {
            const lst = this.positional.get( m ) || [];
            lst.push( { name, help, type } );
            this.positional.set( m, lst );
        }
    }

    /** res.error is not empty if something went wrong */
    parse_args( args: Array<string>, cur_dir: string ): ParsedArgs {
        let res = new ParsedArgs;
        try {
            let num_positional = -1;
            for( let num_arg = 0; num_arg < args.length; ++num_arg ) {
                const val = args[ num_arg ];
                if ( val.startsWith( '--' ) ) {
                    this._use_arg( res, val.slice( 2 ), cur_dir, () => {
                        if ( ++num_arg >= args.length )
                            throw new Error( `'${ val }' must be followed by a value` );
                        return args[ num_arg ];
                    } );
                } else if ( val.startsWith( '-' ) && val.length > 1 ) {
                    for( let nsv = 1; nsv < val.length; ++nsv ) {
                        const sv = val[ nsv ];
                        this._use_arg( res, sv, cur_dir, () => {
                            const nsv_p1 = nsv + 1;
                            if ( nsv_p1 < val.length ) {
                                nsv = val.length;
                                return val.slice( nsv_p1 );
                            }
                            if ( ++num_arg >= args.length )
                                throw new Error( `'-${ sv }' must be followed by a value` );
                            return args[ num_arg ];
                        } );
                    }
                } else if ( num_positional < 0 ) {
                    // mission type (prefixes are accepted if not ambiguous)
                    res.mission = val;
                    if ( ! this.missions.has( val ) ) {
                        const pos = [ ...this.missions.keys() ].filter( trial => trial.startsWith( val ) );
                        if ( pos.length >= 2 )
                            throw new Error( `ambiguous mission type: '${ val }' can be the prefix of ${ pos.map( x => "'" + x + "'" ).join( " or " ) }` );
                        if ( pos.length == 0 )
                            throw new Error( `unknown mission type '${ val }'` );
                        res.mission = pos[ 0 ];
                    }
                    num_positional = 0;
                } else {
                    // positional argument
                    const pag = this.positional.get( res.mission ) || [];
                    if ( num_positional >= pag.length )
                        throw new Error( pag.length ? `too many positional arguments (for mission ${ res.mission })` : `mission ${ res.mission } does not accept positional arguments` );
                    const arg = pag[ num_positional++ ];
                    const attr = arg.name.replace( /-/g, "_" );
                    switch ( arg.type ) {
                        case 'string*':
                            res.values.set( attr, args.slice( num_arg ) );
                            num_arg = args.length - 1;
                            break;
                        default:
                            res.values.set( attr, this._conv( arg.type, val, cur_dir ) );
                    }
                }
            }
        } catch ( e ) {
            res.error = e instanceof Error ? e.message : String( e );
        }
        return res;
    }

    format_help( args: ParsedArgs, nb_columns = 100000 ): string {
        let allowed_missions = new Array<string>();
        if ( args.mission == 'help' )
            allowed_missions.push( ...args.list( 'help_args' ).filter( m => this.missions.has( m ) ) );
        else if ( args.mission )
            allowed_missions.push( args.mission );

        const argname_repr = ( arg: Argument ) => ( arg.short ? '-' + arg.short : '' ) + ( arg.long ? ( arg.short ? ', ' : '' ) + '--' + arg.long : '' );
        const pos_repr = ( arg: PositionalArgument ) => arg.type.endsWith( '*' ) ? `[${ arg.name }*]` : arg.name;
        const used_args = this.args.filter( arg => allowed_missions.length == 0 || arg.missions.length == 0 || allowed_missions.some( m => arg.missions.indexOf( m ) >= 0 ) );

        // width of the first column
        let mla = 0;
        for( const title of [ ...this.missions.keys(), ...used_args.map( argname_repr ) ] )
            mla = Math.max( mla, title.length );

        let res = '';
        const add_line = ( beg: string, msg: string, len = beg.length ) => {
            msg = msg.replace( '__MISSION_TYPES__', [ ...this.missions.keys() ].join( ', ' ) );
            const ml = Math.max( nb_columns - beg.length, 10 );
            res += beg;
            while ( msg.length > ml ) {
                let a = msg.lastIndexOf( ' ', ml );
                if ( a <= 0 )
                    a = ml;
                res += msg.slice( 0, a ) + "\n" + ' '.repeat( len );
                msg = msg.slice( a ).trim();
            }
            res += msg + '\n';
        };
        const col = ( title: string ) => `  ${ title + ' '.repeat( mla - title.length ) }: `;

        res += `${ this.prg_name }, ${ this.description }\n\n`;

        // usage line(s)
        const opt_args = used_args.map( arg => `[${ argname_repr( arg ) }]` );
        if ( allowed_missions.length ) {
            for( const mission of allowed_missions ) {
                res += `Usage for mission '${ mission }':\n`;
                add_line( '  ', [ this.prg_name, ...opt_args, mission, ...( this.positional.get( mission ) || [] ).map( pos_repr ) ].join( ' ' ) );
            }
            res += '\n';
        } else {
            res += `Usage:\n`;
            add_line( '  ', [ this.prg_name, ...opt_args, `{${ [ ...this.missions.keys() ].join( ',' ) }} [mission arguments...]` ].join( ' ' ) );
            res += '\nMission types:\n';
            this.missions.forEach( ( desc, mission ) => add_line( col( mission ), desc ) );
            res += '\n';
        }

        res += `Optional arguments:\n`;
        for( const arg of used_args )
            add_line( col( argname_repr( arg ) ), arg.help );

        for( const mission of allowed_missions ) {
            const pas = this.positional.get( mission ) || [];
            if ( pas.length ) {
                res += `\nPositional arguments for mission '${ mission }':\n`;
                for( const pa of pas )
                    add_line( col( pos_repr( pa ) ), pa.help );
            }
        }

        return res;
    }

    _use_arg( res: ParsedArgs, name: string, cur_dir: string, get_next: () => string ): void {
        // find arg
        const arg = name.length > 1 ?
            this.args.find( arg => name == arg.long ) :
            this.args.find( arg => name == arg.short );
        if ( ! arg )
            throw new Error( `unrecognized option '${ ( name.length > 1 ? '--' : '-' ) + name }'` );
        if ( res.mission && arg.missions.length && arg.missions.indexOf( res.mission ) < 0 )
            throw new Error( `option '${ argname( arg ) }' is not used by mission '${ res.mission }'` );

        // fill res
        const attr = ( arg.long || arg.short ).replace( /-/g, "_" );
        res.values.set( attr, arg.type == 'boolean' ? true : this._conv( arg.type, get_next(), cur_dir ) );
    }

    _conv( type: ArgumentType, val: string, cur_dir: string ): string {
        return type == 'path' ? path.resolve( cur_dir, val ) : val;
    }

    prg_name    = "";
    description = "";
    version     = "";
    missions    = new Map<string,string>();                   /** mission => description */
    args        = new Array<Argument>();
    positional  = new Map<string,Array<PositionalArgument>>(); /** positional arguments for each mission type */
}

function argname( arg: Argument ): string {
    return arg.long ? '--' + arg.long : '-' + arg.short;
}
