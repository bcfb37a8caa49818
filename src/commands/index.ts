export { addCommand } from './add.js';
export { getCommand } from './get.js';
export { listCommand } from './list.js';
export { editCommand } from './edit.js';
export { removeCommand } from './remove.js';
export { infoCommand } from './info.js';
export { backupCommand, backupsCommand } from './backup.js';
export { restoreCommand } from './restore.js';
export { deleteCommand } from './delete.js';
