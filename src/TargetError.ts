/** */
export declare type TargetErrorKind =
    "MissingRequiredField"   | /** e.g. no sources */
    "MissingDependentField"  | /** field required by the presence of another one (plugin suffix, ...) */
    "MalformedOptionsString" | /** generator options not ending with ':' */
    "InvalidPath"            |
    "InvalidLabel"           |
    "DuplicateTarget"        | /** same label, different content */
    "DuplicateOutput"        | /** file declared as output twice */
    "InvalidTargetFile";

/**
 * Fatal error during the evaluation of a target description. `target` is the name or
 * the label of the target (or the name of the file) being evaluated.
 */
export default
class TargetError extends Error {
    constructor( kind: TargetErrorKind, target: string, msg: string ) {
        super( target ? `${ target }: ${ msg }` : msg );
        this.name   = "TargetError";
        this.kind   = kind;
        this.target = target;
    }

    kind  : TargetErrorKind;
    target: string;
}
