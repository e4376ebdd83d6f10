// bmp-js ships no type declarations.
declare module "bmp-js" {
  namespace bmp {
    interface DecodedBmp {
      width: number;
      height: number;
      /** Four bytes per pixel in A, B, G, R order, rows top to bottom. */
      data: Buffer;
    }

    function decode(buffer: Buffer): DecodedBmp;
  }

  export = bmp;
}
