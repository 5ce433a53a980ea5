import { CompileUnitSpec } from "./CompileUnit"
import GenerationPlan      from "./GenerationPlan"

export declare type NodeArgs = GenerationPlan | CompileUnitSpec;

/** node of the build graph, as declared to the host build system */
export default
class CompilationNode {
    constructor( signature: string, label: string, children: Array<CompilationNode>, args: NodeArgs ) {
        this.signature = signature;
        this.label     = label;
        this.children  = children;
        this.args      = args;
    }

    get type(): NodeArgs[ "kind" ] {
        return this.args.kind;
    }

    /** files produced by this node (nothing for compile units, linking is not described here) */
    get outputs(): Array<string> {
        return this.args.kind == "action_foreach" ? this.args.outputs : [];
    }

    get pretty(): string {
        return `${ this.type }(${ [ this.label, ...this.children.map( ch => ch.pretty ) ].join( ',' ) })`;
    }

    /** return true if this or one of its children (recursively) checks `cond` */
    some_rec( cond: ( cn: CompilationNode ) => boolean, visited = new Set<CompilationNode>() ): boolean {
        if ( visited.has( this ) )
            return false;
        visited.add( this );
        return cond( this ) || this.children.some( ch => ch.some_rec( cond, visited ) );
    }

    signature: string;                 /** serve as an unique id */
    label    : string;                 /** e.g. //foo:bar_proto_gen */
    children : Array<CompilationNode>; /** nodes declared here that this depends on */
    args     : NodeArgs;
}
