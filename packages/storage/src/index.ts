/**
 * @frontport/storage
 */

export { FileOutputWriter } from './file-output-writer.js';
