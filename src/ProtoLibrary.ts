import { TargetConfig,
         resolve_target_config } from "./TargetConfig"
import { make_compile_unit,
         CompileUnitSpec }       from "./CompileUnit"
import { BuildSettings }         from "./BuildSettings"
import DescriptorResolver        from "./DescriptorResolver"
import GenerationPlan            from "./GenerationPlan"
import CompilationNode           from "./CompilationNode"
import Pool                      from "./Pool"

/** */
export
interface ProtoLibraryNodes {
    generation: CompilationNode; /** action_foreach */
    compile   : CompilationNode; /** source_set or static_library, with `generation` as child */
    plan      : GenerationPlan;  /** args of `generation` */
    unit      : CompileUnitSpec; /** args of `compile` */
}

/**
 * Declaration of proto libraries in a build graph: each target gives a generation node (protoc launched
 * for each source) and a compile node for the generated code.
 */
export default
class ProtoLibrary {
    constructor( settings: BuildSettings, pool = new Pool ) {
        this.settings = settings;
        this.resolver = new DescriptorResolver( settings );
        this.pool     = pool;
    }

    declare( config: TargetConfig ): ProtoLibraryNodes {
        const rc = resolve_target_config( config );
        const plan = this.resolver.plan_for( rc );
        const unit = make_compile_unit( rc, plan, this.settings );

        // a target is declared entirely or not at all
        const had_generation = this.pool.get( plan.label ) != undefined;
        const generation = this.pool.New( plan.label, [], plan );
        try {
            const compile = this.pool.New( unit.label, [ generation ], unit );
            return { generation, compile, plan, unit };
        } catch ( e ) {
            if ( ! had_generation )
                this.pool.remove( generation );
            throw e;
        }
    }

    settings: BuildSettings;
    resolver: DescriptorResolver;
    pool    : Pool;
}
