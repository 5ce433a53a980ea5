import { ResolvedTargetConfig } from "./TargetConfig"
import { BuildSettings }        from "./BuildSettings"
import GenerationPlan           from "./GenerationPlan"
import { pu }                   from "./ArrayUtil"

/** compilation of the generated C++ code */
export
interface CompileUnitSpec {
    kind          : "source_set" | "static_library";
    name          : string;
    label         : string;
    sources       : Array<string>;        /** outputs of the generation node */
    visibility    : Array<string> | null; /** null => no restriction */
    defines       : Array<string>;
    configs       : Array<string>;
    public_configs: Array<string>;
    public_deps   : Array<string>;
    deps          : Array<string>;
}

/**
 * A source_set is used (instead of a static_library) only if asked for a component build, where
 * exported symbols of an archive that nobody references would be dropped by the linker.
 */
export function make_compile_unit( rc: ResolvedTargetConfig, plan: GenerationPlan, settings: BuildSettings ): CompileUnitSpec {
    return {
        kind          : rc.component_build_force_source_set && settings.is_component_build ? "source_set" : "static_library",
        name          : rc.name,
        label         : rc.label,
        sources       : [ ...plan.outputs ],
        visibility    : rc.visibility ? [ ...rc.visibility ] : null,
        defines       : [ ...rc.defines ],
        configs       : [ ...rc.extra_configs ],
        public_configs: [ settings.using_proto_config ],
        // generated .pb.h include headers of the runtime. Nothing is known for plugin outputs.
        public_deps   : rc.generate_cc ? [ settings.runtime_label ] : [],
        // user deps are repeated here to be linked (being a dep of the action is not enough for that)
        deps          : pu( [ plan.label ], ...rc.deps ),
    };
}
