import CommunicationEnvironment from "./CommunicationEnvironment"
import CompilationNode          from "./CompilationNode"
import { to_fs_path }           from "./SourcePath"
import * as async               from "async"
import * as fs                  from "fs"
import rimraf                   from "rimraf"

/** removal of the files declared as outputs of generation nodes */
export default
class Cleaner {
    constructor( com: CommunicationEnvironment, source_root: string ) {
        this.com         = com;
        this.source_root = source_root;
    }

    /** `done` gets the list of removed files (source absolute names) */
    clean( cns: Array<CompilationNode>, done: ( err: Error | null, removed: Array<string> ) => void ): void {
        let removed = new Array<string>();
        const outputs = cns.reduce( ( lst, cn ) => lst.concat( cn.outputs ), new Array<string>() );
        async.eachSeries( outputs, ( output: string, cb: ( err?: Error | null ) => void ) => {
            const name = to_fs_path( output, this.source_root );
            fs.stat( name, ( err, stats ) => {
                if ( err )
                    return cb( null );
                if ( stats.isDirectory() )
                    return cb( new Error( `'${ name }' is a directory, not a generated file` ) );
                this.com.note( `Removing ${ name }` );
                rimraf( name, err => {
                    if ( err )
                        return cb( err );
                    removed.push( output );
                    cb( null );
                } );
            } );
        }, err => done( err || null, removed ) );
    }

    com        : CommunicationEnvironment;
    source_root: string; /** file system directory of '//' */
}
