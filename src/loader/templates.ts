// Everything this tool assumes about `cargo web`'s generated loader and about the
// Screeps runtime lives here. Whitespace in the templates is matched loosely; every
// other character must appear verbatim, except PLACEHOLDER.

/** Stands for a crate-derived identifier (the crate name, the .wasm basename). */
export const PLACEHOLDER = 'XXX';

/** Function defined by the generated loader that instantiates the module. */
export const ENTRY_POINT = '__initialize';

export const EXPECTED_PREFIX = `"use strict";

if( typeof Rust === "undefined" ) {
    var Rust = {};
}

(function( root, factory ) {
    if( typeof define === "function" && define.amd ) {
        define( [], factory );
    } else if( typeof module === "object" && module.exports ) {
        module.exports = factory();
    } else {
        Rust.XXX = factory();
    }
}( this, function() {
    `;

export const EXPECTED_SUFFIX = `


    if( typeof window === "undefined" ) {
        const fs = require( "fs" );
        const path = require( "path" );
        const wasm_path = path.join( __dirname, "XXX.wasm" );
        const buffer = fs.readFileSync( wasm_path );
        const mod = new WebAssembly.Module( buffer );

        return __initialize( mod, false );
    } else {
        return fetch( "XXX.wasm" )
            .then( response => response.arrayBuffer() )
            .then( bytes => WebAssembly.compile( bytes ) )
            .then( mod => __initialize( mod, true ) );
    }
}));
`;

// Screeps exposes an uploaded binary module through a synchronous require();
// `false` tells __initialize not to load asynchronously.
export const INITIALIZE_CALL = `

__initialize(new WebAssembly.Module(require('compiled')), false);
`;

export const OUTPUT_WASM_FILE = 'compiled.wasm';
export const OUTPUT_JS_FILE = 'main.js';
