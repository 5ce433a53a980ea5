import TargetError from "./TargetError"
import * as path   from "path"

/**
 * Paths in target descriptions are "source absolute" (`//dir/file.proto`, relative to the source root)
 * or relative to the directory of the target. Manipulations are done with posix semantics, whatever the host.
 */

/** true for `//...` */
export function is_source_absolute( p: string ): boolean {
    return p.startsWith( "//" );
}

/** `p` relative to `dir` (itself source absolute) => source absolute path, normalized */
export function resolve_source( dir: string, p: string ): string {
    if ( is_source_absolute( p ) )
        return "//" + normalize_rel( p.slice( 2 ), p );
    if ( p.startsWith( "/" ) )
        throw new TargetError( "InvalidPath", "", `'${ p }' is a system absolute path (expected '//...' or a relative path)` );
    if ( ! is_source_absolute( dir ) )
        throw new TargetError( "InvalidPath", "", `'${ dir }' is not a source absolute directory` );
    return "//" + normalize_rel( path.posix.join( dir.slice( 2 ), p ), p );
}

/** concatenation of `dir` and relative `parts` */
export function join_source( dir: string, ...parts: Array<string> ): string {
    return resolve_source( dir, path.posix.join( ...parts ) );
}

/** path of `p` relative to directory `base` (both source absolute). "." if p == base */
export function rebase_path( p: string, base: string ): string {
    return path.posix.relative( "/" + base.slice( 2 ), "/" + p.slice( 2 ) ) || ".";
}

/** `//dir/foo.proto` => `//dir` */
export function source_dir( file: string ): string {
    const dir = path.posix.dirname( file.slice( 2 ) );
    return dir == "." ? "//" : "//" + dir;
}

/** `//dir/foo.proto` => `dir`, `//foo.proto` => `.` */
export function source_root_relative_dir( file: string ): string {
    return path.posix.dirname( file.slice( 2 ) );
}

/** `//dir/foo.proto` => `foo.proto` */
export function source_file_part( file: string ): string {
    return path.posix.basename( file );
}

/** `//dir/foo.proto` => `foo` (only the last extension is removed) */
export function source_name_part( file: string ): string {
    const name = source_file_part( file );
    return name.slice( 0, name.length - path.posix.extname( name ).length );
}

/** file system path => source absolute path */
export function to_source_absolute( fs_path: string, source_root: string ): string {
    const rel = path.relative( source_root, fs_path );
    if ( path.isAbsolute( rel ) )
        throw new TargetError( "InvalidPath", "", `'${ fs_path }' is not in the source root '${ source_root }'` );
    return "//" + normalize_rel( rel.split( path.sep ).join( "/" ), fs_path );
}

/** source absolute path => file system path */
export function to_fs_path( p: string, source_root: string ): string {
    return path.resolve( source_root, ...p.slice( 2 ).split( "/" ) );
}

function normalize_rel( rel: string, orig: string ): string {
    if ( rel.startsWith( "/" ) )
        throw new TargetError( "InvalidPath", "", `'${ orig }' is malformed` );
    const res = path.posix.normalize( rel || "." ).replace( /\/+$/, "" );
    if ( res == ".." || res.startsWith( "../" ) )
        throw new TargetError( "InvalidPath", "", `'${ orig }' is outside of the source root` );
    return res == "." ? "" : res;
}
