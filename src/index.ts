export {
    createIdenticon,
    renderIdenticon,
    type CreateIdenticonOptions,
    type CreateIdenticonOutput,
    type RenderIdenticonOptions,
    type RenderedIdenticon,
} from "./lib/identicon/index.js";
export {
    hashInput,
    pickColor,
    mirrorRow,
    buildGrid,
    filterOddSquares,
    buildPixelMap,
    cellRect,
    md5Hasher,
    type Hasher,
} from "./lib/identicon/pipeline.js";
export { drawImage, rasterize } from "./lib/identicon/draw.js";
export { saveImage, imagePath, IMAGE_EXTENSION } from "./lib/identicon/save.js";
export {
    CELL_SIZE,
    GRID_WIDTH,
    IMAGE_SIZE,
    type ColoredImage,
    type GridCell,
    type GriddedImage,
    type HashedImage,
    type MappedImage,
    type PixelRect,
    type Point,
} from "./lib/identicon/image.js";
export { rgbToHex, type RGB } from "./lib/color/rgb.js";
export { IdenticonError, InsufficientDataError, IOError } from "./lib/errors.js";
export { loadConfig, type IdenticonConfig } from "./lib/config.js";
export { IdenticonServer } from "./server.js";
