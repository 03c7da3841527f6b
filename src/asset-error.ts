export type AssetErrorKind =
    /**
     * A model, archive or image file could not be found on disk.
     */
    'NotFound' |

    /**
     * The compressed bitstream ended before its end-of-stream marker.
     */
    'TruncatedStream' |

    /**
     * A header or a declared count runs past the end of the input.
     */
    'MalformedHeader' |

    /**
     * An image record declares a color type other than 4bpp, 8bpp or 16bpp.
     */
    'UnsupportedColorType' |

    /**
     * A model primitive record carries an unrecognized type code.
     */
    'UnknownPrimitiveTag' |

    /**
     * The requested object does not exist within the model file.
     */
    'ObjectIndexOutOfRange' |

    /**
     * The declared archive image sizes do not add up to the decompressed length.
     */
    'SizeMismatch';


export class AssetError extends Error {

    public readonly kind: AssetErrorKind;
    public readonly path: string | undefined;

    public constructor(kind: AssetErrorKind, message: string, path?: string) {
        super(path ? `${message} (${path})` : message);
        this.name = 'AssetError';
        this.kind = kind;
        this.path = path;
    }

    public withPath(path: string): AssetError {
        return this.path ? this : new AssetError(this.kind, this.message, path);
    }

}


export const isAssetError = (error: unknown, kind?: AssetErrorKind): error is AssetError =>
    error instanceof AssetError && (kind === undefined || error.kind === kind);
