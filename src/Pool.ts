import CompilationNode,
     { NodeArgs }      from "./CompilationNode"
import { first_duplicate } from "./ArrayUtil"
import TargetError     from "./TargetError"
import stringify       from "json-stable-stringify"

/**
 * label => CompilationNode, for all the nodes declared during an evaluation.
 *
 * Declaring twice the same node is allowed (the first instance is returned). Declaring two nodes with the
 * same label and a different content, or two nodes that generate the same file, is an error.
 */
export default
class Pool {
    New( label: string, children: Array<CompilationNode>, args: NodeArgs ): CompilationNode {
        // already created ?
        const signature = Pool.signature( label, children, args );
        const old = this.m.get( label );
        if ( old ) {
            if ( old.signature == signature )
                return old;
            throw new TargetError( "DuplicateTarget", label, `is declared twice, with different content (${ old.pretty } and ${ args.kind })` );
        }

        const res = new CompilationNode( signature, label, children, args );
        const dup = first_duplicate( res.outputs );
        if ( dup )
            throw new TargetError( "DuplicateOutput", label, `'${ dup }' is generated twice (sources with the same name in the same output directory ?)` );
        for( const output of res.outputs ) {
            const owner = this.generated_by.get( output );
            if ( owner )
                throw new TargetError( "DuplicateOutput", label, `'${ output }' is also generated by '${ owner.label }'` );
        }

        for( const output of res.outputs )
            this.generated_by.set( output, res );
        this.m.set( label, res );
        return res;
    }

    /** forget `cn` and the outputs it claims */
    remove( cn: CompilationNode ): void {
        if ( this.m.get( cn.label ) == cn )
            this.m.delete( cn.label );
        for( const output of cn.outputs )
            if ( this.generated_by.get( output ) == cn )
                this.generated_by.delete( output );
    }

    get( label: string ): CompilationNode | undefined {
        return this.m.get( label );
    }

    /** in declaration order */
    get nodes(): Array<CompilationNode> {
        return [ ...this.m.values() ];
    }

    static signature( label: string, children: Array<CompilationNode>, args: NodeArgs ): string {
        return stringify( [ label, children.map( ch => ch.signature ), args ] ) || "";
    }

    m            = new Map<string,CompilationNode>(); /** label => instance */
    generated_by = new Map<string,CompilationNode>(); /** output file => generation node */
}
