import ArgumentParser from "./ArgumentParser"
import { Writable }   from "stream"

export declare type MsgType = "A" | "N" | "I" | "E"; /** announcement, note, info, error */

/** Where messages go for a given run. In framed mode, each message is a line `type encoded_msg` (see `encode`) */
export default
class CommunicationEnvironment {
    constructor( out: Writable, err: Writable, verbosity = 0, framed = false ) {
        this.out       = out;
        this.err       = err;
        this.verbosity = verbosity;
        this.framed    = framed;
    }

    decl_additional_options( p: ArgumentParser ) {
        p.add_argument( [], 'silent'      , 'Display only errors'                              , 'boolean' );
        p.add_argument( [], 'verbose'     , 'Give more information about what is being done'   , 'boolean' );
        p.add_argument( [], 'very-verbose', 'Give a lot of information about what is being done', 'boolean' );
        p.add_argument( [], 'framed'      , 'One line per message, with spaces and new lines escaped (for use by another process)', 'boolean' );
    }

    /** -1 => silent, 0 => default, 1 => verbose, 2 => very verbose */
    set_verbosity_from( silent: boolean, verbose: boolean, very_verbose: boolean ) {
        this.verbosity = silent ? -1 : very_verbose ? 2 : verbose ? 1 : 0;
    }

    // communication
    announcement( msg: string, add_lf = true ) {
        if ( this.verbosity >= 0 )
            this._msg( 'A', msg, add_lf );
    }

    /** displayed only if verbose */
    note( msg: string, add_lf = true ) {
        if ( this.verbosity >= 1 )
            this._msg( 'N', msg, add_lf );
    }

    /** displayed only if very verbose */
    detail( msg: string, add_lf = true ) {
        if ( this.verbosity >= 2 )
            this._msg( 'N', msg, add_lf );
    }

    info( msg: string, add_lf = true ) {
        if ( this.verbosity >= 0 )
            this._msg( 'I', msg, add_lf );
    }

    error( msg: string, add_lf = true ) {
        this._msg( 'E', msg, add_lf );
    }

    /** `\` => `\\`, new line => `\n`, space => `\s` */
    static encode( str: string ): string {
        return str.replace( /[\\\n ]/g, c => c == '\\' ? '\\\\' : c == '\n' ? '\\n' : '\\s' );
    }

    _msg( type: MsgType, msg: string, add_lf: boolean ) {
        const txt = msg + ( add_lf ? '\n' : '' );
        if ( this.framed )
            this.out.write( `${ type } ${ CommunicationEnvironment.encode( txt ) }\n` );
        else
            ( type == 'E' ? this.err : this.out ).write( txt );
    }

    out      : Writable;
    err      : Writable;
    verbosity: number;
    framed   : boolean;
}
