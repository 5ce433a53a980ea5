/** one launch of the wrapper script (i.e. of protoc) */
export
interface FileInvocation {
    source    : string;        /** source absolute path of the .proto file */
    out_dir   : string;        /** where C++ and plugin files are generated */
    py_out_dir: string;        /** where python files are generated */
    args      : Array<string>; /** arguments of the wrapper script, relative to root_build_dir */
    outputs   : Array<string>; /** files that protoc is expected to produce, source absolute */
}

/** action node of the build graph: one FileInvocation per source */
export default
interface GenerationPlan {
    kind       : "action_foreach";
    name       : string;                /** <target name>_gen */
    label      : string;
    script     : string;                /** source absolute path of the wrapper script */
    sources    : Array<string>;
    invocations: Array<FileInvocation>; /** in the order of sources */
    outputs    : Array<string>;         /** outputs of all invocations */
    deps       : Array<string>;         /** protoc and plugin (host toolchain), then user deps */
    visibility : Array<string>;         /** only the compile unit is allowed to depend on this */
}
