
/** push unique. Returns `lst` */
export function pu<T>( lst: Array<T>, ...to_add: Array<T> ): Array<T> {
    for( const v of to_add )
        if ( lst.indexOf( v ) < 0 )
            lst.push( v );
    return lst;
}

/** first duplicated item in `lst`, or null */
export function first_duplicate<T>( lst: Array<T> ): T | null {
    const seen = new Set<T>();
    for( const v of lst ) {
        if ( seen.has( v ) )
            return v;
        seen.add( v );
    }
    return null;
}
