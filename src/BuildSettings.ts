import { resolve_source } from "./SourcePath"
import { resolve_label }  from "./Label"

/** values that do not depend on the target (one set per build directory) */
export
interface BuildSettings {
    root_build_dir        : string;  /** where the build is launched (source absolute) */
    root_gen_dir          : string;  /** root of generated C++ files */
    root_out_dir          : string;  /** output dir of the target toolchain */
    host_root_out_dir     : string;  /** output dir of the host toolchain (where protoc and plugins are built) */
    host_toolchain        : string;  /** label */
    host_executable_suffix: string;  /** e.g. ".exe" */
    is_component_build    : boolean; /** true if components are linked dynamically */
    protoc_label          : string;
    runtime_label         : string;  /** support library needed by generated C++ code */
    using_proto_config    : string;  /** public config for users of generated headers */
    wrapper_script        : string;  /** script launched for each source. Takes the args computed by DescriptorResolver */
    python_out_subdir     : string;  /** python files go to root_out_dir/python_out_subdir/proto_out_dir */
}

/** missing values are deduced from the given ones (e.g. root_gen_dir from root_build_dir) */
export function make_build_settings( o: Partial<BuildSettings> = {} ): BuildSettings {
    const root_build_dir = resolve_source( "//", o.root_build_dir || "//out/Default" );
    const root_out_dir   = resolve_source( "//", o.root_out_dir   || root_build_dir   );
    return {
        root_build_dir,
        root_gen_dir          : resolve_source( "//", o.root_gen_dir      || root_build_dir + "/gen" ),
        root_out_dir,
        host_root_out_dir     : resolve_source( "//", o.host_root_out_dir || root_out_dir            ),
        host_toolchain        : resolve_label ( o.host_toolchain     || "//build/toolchain/linux:clang_x64"       , "//" ),
        host_executable_suffix: o.host_executable_suffix || "",
        is_component_build    : o.is_component_build     || false,
        protoc_label          : resolve_label ( o.protoc_label       || "//third_party/protobuf:protoc"           , "//" ),
        runtime_label         : resolve_label ( o.runtime_label      || "//third_party/protobuf:protobuf_lite"    , "//" ),
        using_proto_config    : resolve_label ( o.using_proto_config || "//third_party/protobuf:using_proto"      , "//" ),
        wrapper_script        : resolve_source( "//", o.wrapper_script || "//tools/protoc_wrapper/protoc_wrapper.py" ),
        python_out_subdir     : o.python_out_subdir || "pyproto",
    };
}
