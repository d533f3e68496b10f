/* src/test/setup.ts
 * Global test setup: unstyled output so assertions see plain text.
 */
process.env.SHELF_BORING = '1';
delete process.env.SHELF_DEBUG;
delete process.env.SHELF_HOME;
