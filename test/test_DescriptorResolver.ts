import { make_build_settings } from '../src/BuildSettings';
import { TargetErrorKind }     from '../src/TargetError';
import { TargetConfig }        from '../src/TargetConfig';
import DescriptorResolver      from '../src/DescriptorResolver';
import TargetError             from '../src/TargetError';
import * as _                  from 'lodash';
import * as assert             from 'assert';

const protoc = "//third_party/protobuf:protoc(//build/toolchain/linux:clang_x64)";

function error_of( kind: TargetErrorKind, target: string ) {
    return ( e: unknown ) => e instanceof TargetError && e.kind == kind && e.target == target;
}

describe( 'DescriptorResolver', () => {
    const resolver = new DescriptorResolver( make_build_settings() );

    it( 'should plan a basic library', () => {
        const plan = resolver.resolve( { name: "foo_proto", dir: "//dir", sources: [ "foo.proto" ] } );
        assert.strictEqual( plan.kind, "action_foreach" );
        assert.strictEqual( plan.name, "foo_proto_gen" );
        assert.strictEqual( plan.label, "//dir:foo_proto_gen" );
        assert.strictEqual( plan.script, "//tools/protoc_wrapper/protoc_wrapper.py" );
        assert.deepStrictEqual( plan.sources, [ "//dir/foo.proto" ] );
        assert.deepStrictEqual( plan.deps, [ protoc ] );
        assert.deepStrictEqual( plan.visibility, [ "//dir:foo_proto" ] );
        assert.deepStrictEqual( plan.outputs, [
            "//out/Default/pyproto/dir/foo_pb2.py",
            "//out/Default/gen/dir/foo.pb.cc",
            "//out/Default/gen/dir/foo.pb.h",
        ] );
        assert.strictEqual( plan.invocations.length, 1 );
        assert.deepStrictEqual( plan.invocations[ 0 ], {
            source    : "//dir/foo.proto",
            out_dir   : "//out/Default/gen/dir",
            py_out_dir: "//out/Default/pyproto/dir",
            args      : [
                "--proto-in-dir", "../../dir",
                "--proto-in-file", "foo.proto",
                "--use-system-protobuf=0",
                "--", "./protoc",
                "--python_out", "pyproto/dir",
                "--cpp_out", "gen/dir",
            ],
            outputs   : plan.outputs,
        } );
    });

    it( 'should handle sources at the root of the tree', () => {
        const inv = resolver.resolve( { name: "a_proto", dir: "//", sources: [ "a.proto" ] } ).invocations[ 0 ];
        assert.deepStrictEqual( inv.outputs, [ "//out/Default/pyproto/a_pb2.py", "//out/Default/gen/a.pb.cc", "//out/Default/gen/a.pb.h" ] );
        assert.deepStrictEqual( inv.args, [ "--proto-in-dir", "../..", "--proto-in-file", "a.proto", "--use-system-protobuf=0", "--", "./protoc", "--python_out", "pyproto", "--cpp_out", "gen" ] );
    });

    it( 'should use proto_out_dir instead of the directory of the sources', () => {
        const inv = resolver.resolve( { name: "foo_proto", dir: "//dir", sources: [ "//other/foo.proto" ], proto_out_dir: "custom/x", generate_python: false } ).invocations[ 0 ];
        assert.strictEqual( inv.out_dir, "//out/Default/gen/custom/x" );
        assert.deepStrictEqual( inv.outputs, [ "//out/Default/gen/custom/x/foo.pb.cc", "//out/Default/gen/custom/x/foo.pb.h" ] );
        assert.deepStrictEqual( inv.args, [ "--proto-in-dir", "../../other", "--proto-in-file", "foo.proto", "--use-system-protobuf=0", "--", "./protoc", "--cpp_out", "gen/custom/x" ] );
    });

    it( 'should put the include arguments first', () => {
        const inv = resolver.resolve( { name: "foo_proto", dir: "//dir", sources: [ "foo.proto" ], cc_include: "base/export.h", generate_python: false } ).invocations[ 0 ];
        assert.deepStrictEqual( inv.args.slice( 0, 5 ), [ "--include", "base/export.h", "--protobuf", "gen/dir/foo.pb.h", "--proto-in-dir" ] );
    });

    it( 'should prepend generator options to the output directory', () => {
        const inv = resolver.resolve( { name: "foo_proto", dir: "//dir", sources: [ "foo.proto" ], cc_generator_options: "dllexport_decl=FOO_EXPORT:", generate_python: false } ).invocations[ 0 ];
        assert.deepStrictEqual( inv.args.slice( -2 ), [ "--cpp_out", "dllexport_decl=FOO_EXPORT:gen/dir" ] );
    });

    it( 'should launch generator plugins', () => {
        const plan = resolver.resolve( {
            name            : "foo_proto",
            dir             : "//dir",
            sources         : [ "foo.proto" ],
            generate_python : false,
            generate_cc     : false,
            generator_plugin: { label: "//tools/plugin:gen_mojo", suffix: ".mojom", options: "opt:" },
        } );
        assert.deepStrictEqual( plan.outputs, [ "//out/Default/gen/dir/foo.mojom.cc", "//out/Default/gen/dir/foo.mojom.h" ] );
        assert.deepStrictEqual( plan.invocations[ 0 ].args.slice( -4 ), [ "--plugin", "protoc-gen-plugin=gen_mojo", "--plugin_out", "opt:gen/dir" ] );
        assert.deepStrictEqual( plan.deps, [ protoc, "//tools/plugin:gen_mojo(//build/toolchain/linux:clang_x64)" ] );
    });

    it( 'should find host executables in the host output directory', () => {
        const cross = new DescriptorResolver( make_build_settings( {
            root_build_dir        : "//out/Win",
            host_root_out_dir     : "//out/Win/clang_x64",
            host_executable_suffix: ".exe",
        } ) );
        const inv = cross.resolve( { name: "foo_proto", dir: "//dir", sources: [ "foo.proto" ] } ).invocations[ 0 ];
        assert.deepStrictEqual( inv.args.slice( 4, 7 ), [ "--use-system-protobuf=0", "--", "./clang_x64/protoc.exe" ] );
        assert.deepStrictEqual( inv.outputs, [ "//out/Win/pyproto/dir/foo_pb2.py", "//out/Win/gen/dir/foo.pb.cc", "//out/Win/gen/dir/foo.pb.h" ] );
    });

    it( 'should resolve and dedupe dependencies', () => {
        const plan = resolver.resolve( { name: "foo_proto", dir: "//dir", sources: [ "foo.proto" ], deps: [ ":foo_base", protoc, "../lib:common" ] } );
        assert.deepStrictEqual( plan.deps, [ protoc, "//dir:foo_base", "//lib:common" ] );
    });

    it( 'should give one invocation per source, in order', () => {
        const sources = _.range( 5 ).map( i => `sub${ i % 2 }/p${ i }.proto` );
        const config: TargetConfig = { name: "many_proto", dir: "//dir", sources };
        const plan = resolver.resolve( config );
        assert.deepStrictEqual( plan.invocations.map( inv => inv.source ), sources.map( s => "//dir/" + s ) );
        assert.strictEqual( plan.outputs.length, 3 * sources.length );
        for( const output of plan.outputs )
            assert.ok( output.startsWith( "//out/Default/" ), output );
        assert.deepStrictEqual( plan.invocations[ 3 ].outputs[ 1 ], "//out/Default/gen/dir/sub1/p3.pb.cc" );
        // no state
        assert.deepStrictEqual( resolver.resolve( config ), plan );
    });

    it( 'should report malformed targets', () => {
        assert.throws( () => resolver.resolve( { name: "", sources: [ "a.proto" ] } ), error_of( "MissingRequiredField", "" ) );
        assert.throws( () => resolver.resolve( { name: "x" } ), error_of( "MissingRequiredField", "x" ) );
        assert.throws( () => resolver.resolve( { name: "a:b", sources: [ "a.proto" ] } ), error_of( "InvalidLabel", "a:b" ) );
        assert.throws( () => resolver.resolve( { name: "x", sources: [ "a.proto" ], generator_plugin: { label: "//p" } } ), error_of( "MissingDependentField", "x" ) );
        assert.throws( () => resolver.resolve( { name: "x", sources: [ "a.proto" ], generator_plugin: { label: "//p", suffix: ".p", options: "bar" } } ), error_of( "MalformedOptionsString", "x" ) );
        assert.throws( () => resolver.resolve( { name: "x", sources: [ "a.proto" ], cc_generator_options: "foo" } ), error_of( "MalformedOptionsString", "x" ) );
        assert.throws( () => resolver.resolve( { name: "x", sources: [ "a.proto" ], proto_out_dir: "/abs" } ), error_of( "InvalidPath", "x" ) );
        assert.throws( () => resolver.resolve( { name: "x", sources: [ "a.proto" ], deps: [ "//a:b)" ] } ), error_of( "InvalidLabel", "x" ) );
        assert.throws( () => resolver.resolve( { name: "x", sources: [ "/abs/a.proto" ] } ), {
            name   : "TargetError",
            message: "x: '/abs/a.proto' is a system absolute path (expected '//...' or a relative path)",
        } );
    });

    it( 'should keep generated files in their roots', () => {
        assert.throws( () => resolver.resolve( { name: "x", dir: "//dir", sources: [ "foo.proto" ], proto_out_dir: "../../../dir" } ), {
            name   : "TargetError",
            message: "x: 'proto_out_dir' leads to '//dir', outside of '//out/Default/gen'",
        } );
        assert.throws( () => resolver.resolve( { name: "x", dir: "//dir", sources: [ "foo.proto" ], proto_out_dir: "../other", generate_python: false } ), error_of( "InvalidPath", "x" ) );
        // outside of the source root
        assert.throws( () => resolver.resolve( { name: "x", dir: "//dir", sources: [ "foo.proto" ], proto_out_dir: "../../../../x" } ), error_of( "InvalidPath", "x" ) );

        const inv = resolver.resolve( { name: "x", dir: "//dir", sources: [ "foo.proto" ], proto_out_dir: "sub/../ok" } ).invocations[ 0 ];
        assert.strictEqual( inv.out_dir, "//out/Default/gen/ok" );
        assert.strictEqual( inv.py_out_dir, "//out/Default/pyproto/ok" );
    });

    it( 'should accept an empty plugin suffix', () => {
        const plan = resolver.resolve( {
            name            : "foo_proto",
            dir             : "//dir",
            sources         : [ "foo.proto" ],
            generate_python : false,
            generate_cc     : false,
            generator_plugin: { label: "//tools/plugin:gen", suffix: "" },
        } );
        assert.deepStrictEqual( plan.outputs, [ "//out/Default/gen/dir/foo.cc", "//out/Default/gen/dir/foo.h" ] );
        assert.deepStrictEqual( plan.invocations[ 0 ].args.slice( -2 ), [ "--plugin_out", "gen/dir" ] );
    });
});
