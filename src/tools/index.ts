/**
 * tools/index.ts
 *
 * Importing this module registers every tool module with the registry.
 */

import './system_info';
import './system_cleaner';
import './toolkit';
