import { make_build_settings } from '../src/BuildSettings';
import ProtoLibrary            from '../src/ProtoLibrary';
import TargetError             from '../src/TargetError';
import Pool                    from '../src/Pool';
import * as assert             from 'assert';

describe( 'ProtoLibrary', () => {
    it( 'should declare a generation and a compile node', () => {
        const pool = new Pool;
        const lib = new ProtoLibrary( make_build_settings(), pool );
        const nodes = lib.declare( { name: "foo_proto", dir: "//dir", sources: [ "foo.proto" ] } );
        assert.strictEqual( nodes.compile.pretty, "static_library(//dir:foo_proto,action_foreach(//dir:foo_proto_gen))" );
        assert.strictEqual( nodes.generation.outputs.length, 3 );
        assert.deepStrictEqual( nodes.compile.outputs, [] );
        assert.strictEqual( pool.get( "//dir:foo_proto" ), nodes.compile );
        assert.deepStrictEqual( pool.nodes.map( cn => cn.label ), [ "//dir:foo_proto_gen", "//dir:foo_proto" ] );
        assert.strictEqual( nodes.generation.args, nodes.plan );
        assert.strictEqual( nodes.compile.args, nodes.unit );
    });

    it( 'should accept the same declaration twice', () => {
        const lib = new ProtoLibrary( make_build_settings() );
        const a = lib.declare( { name: "foo_proto", dir: "//dir", sources: [ "foo.proto" ] } );
        const b = lib.declare( { name: "foo_proto", dir: "//dir", sources: [ "foo.proto" ] } );
        assert.strictEqual( a.generation, b.generation );
        assert.strictEqual( a.compile, b.compile );
        assert.strictEqual( lib.pool.nodes.length, 2 );
    });

    it( 'should reject two different targets with the same label', () => {
        const lib = new ProtoLibrary( make_build_settings() );
        lib.declare( { name: "foo_proto", dir: "//dir", sources: [ "foo.proto" ] } );
        assert.throws( () => lib.declare( { name: "foo_proto", dir: "//dir", sources: [ "bar.proto" ] } ),
            ( e: unknown ) => e instanceof TargetError && e.kind == "DuplicateTarget" && e.target == "//dir:foo_proto_gen" );
    });

    it( 'should reject files generated twice', () => {
        const lib = new ProtoLibrary( make_build_settings() );
        lib.declare( { name: "a", dir: "//dir", sources: [ "foo.proto" ] } );
        assert.throws( () => lib.declare( { name: "b", dir: "//dir", sources: [ "foo.proto" ] } ), {
            name   : "TargetError",
            message: "//dir:b_gen: '//out/Default/pyproto/dir/foo_pb2.py' is also generated by '//dir:a_gen'",
        } );
        assert.throws( () => lib.declare( { name: "c", dir: "//dir", sources: [ "x.proto", "sub/../x.proto" ] } ),
            ( e: unknown ) => e instanceof TargetError && e.kind == "DuplicateOutput" && e.target == "//dir:c_gen" );
        // nothing is registered for failed declarations
        assert.strictEqual( lib.pool.get( "//dir:b_gen" ), undefined );
    });

    it( 'should leave the pool untouched when the compile node is rejected', () => {
        const lib = new ProtoLibrary( make_build_settings() );
        lib.declare( { name: "foo", dir: "//d", sources: [ "foo.proto" ] } );
        // label of the compile node is the label of the generation node of `foo`
        assert.throws( () => lib.declare( { name: "foo_gen", dir: "//d", sources: [ "baz.proto" ] } ),
            ( e: unknown ) => e instanceof TargetError && e.kind == "DuplicateTarget" && e.target == "//d:foo_gen" );
        assert.deepStrictEqual( lib.pool.nodes.map( cn => cn.label ), [ "//d:foo_gen", "//d:foo" ] );
        assert.strictEqual( lib.pool.generated_by.has( "//out/Default/gen/d/baz.pb.cc" ), false );

        const other = lib.declare( { name: "other", dir: "//d", sources: [ "baz.proto" ] } );
        assert.deepStrictEqual( other.generation.outputs, [ "//out/Default/pyproto/d/baz_pb2.py", "//out/Default/gen/d/baz.pb.cc", "//out/Default/gen/d/baz.pb.h" ] );
    });
});
