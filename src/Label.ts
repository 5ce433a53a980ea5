import { resolve_source } from "./SourcePath"
import TargetError        from "./TargetError"
import * as path          from "path"

/** `//dir:name(//toolchain/dir:name)` */
export
interface Label {
    dir      : string; /** source absolute */
    name     : string;
    toolchain: string; /** absolute label, or "" if not specified */
}

/** accepts `//dir:name`, `//dir` (name = last component of dir), `:name`, `rel/dir:name`, each with an optional `(toolchain)` */
export function parse_label( str: string, cur_dir: string ): Label {
    let s = str.trim(), toolchain = "";
    if ( s.endsWith( ")" ) ) {
        const o = s.indexOf( "(" );
        if ( o < 0 )
            throw new TargetError( "InvalidLabel", "", `'${ str }' has a ')' without '('` );
        toolchain = resolve_label( s.slice( o + 1, s.length - 1 ), cur_dir );
        s = s.slice( 0, o );
    } else if ( s.indexOf( "(" ) >= 0 )
        throw new TargetError( "InvalidLabel", "", `'${ str }' has a '(' without ')'` );

    if ( ! s )
        throw new TargetError( "InvalidLabel", "", `empty label${ str ? ` in '${ str }'` : "" }` );

    const c = s.lastIndexOf( ":" );
    const dir = resolve_source( cur_dir, c >= 0 ? s.slice( 0, c ) : s );
    const name = c >= 0 ? s.slice( c + 1 ) : path.posix.basename( dir.slice( 2 ) );
    if ( ! name || name.indexOf( "/" ) >= 0 )
        throw new TargetError( "InvalidLabel", "", `'${ str }' does not have a valid target name` );

    return { dir, name, toolchain };
}

/** */
export function label_str( label: Label ): string {
    return `${ label.dir }:${ label.name }${ label.toolchain ? `(${ label.toolchain })` : "" }`;
}

/** `str` relative to `cur_dir` => absolute label */
export function resolve_label( str: string, cur_dir: string ): string {
    return label_str( parse_label( str, cur_dir ) );
}

/** absolute label of `str`, in `toolchain` if not already specified */
export function with_toolchain( str: string, toolchain: string, cur_dir = "//" ): string {
    const label = parse_label( str, cur_dir );
    if ( ! label.toolchain )
        label.toolchain = resolve_label( toolchain, cur_dir );
    return label_str( label );
}
