/**
 * Default crawl constants
 * Shared by the config schema and the CLI help text
 */

export const DEFAULT_ROOT_URL = 'https://www.bracu.ac.bd/';

/** Hosts the crawler may fetch from (main site and its bare-domain alias) */
export const DEFAULT_ALLOWED_DOMAINS = ['www.bracu.ac.bd', 'bracu.ac.bd'];

/** Path extensions that never carry page text */
export const DEFAULT_SKIP_EXTENSIONS = [
  // images
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.svg',
  '.webp',
  '.ico',
  // documents and archives
  '.pdf',
  '.zip',
  '.rar',
  '.7z',
  '.doc',
  '.docx',
  '.ppt',
  '.pptx',
  '.xls',
  '.xlsx',
  // assets
  '.css',
  '.js',
  '.json',
  '.xml',
  // media
  '.mp3',
  '.mp4',
  '.avi',
  '.mov',
  '.wmv',
];

/**
 * Priority paths enqueued at crawl start so that important sections are
 * covered even when nothing links to them from the pages fetched first.
 */
export const DEFAULT_SEED_PATHS = [
  '/',
  '/about',
  '/about/overview',
  '/about/mission-vision',
  '/about/history',
  '/about/governance',
  '/about/accreditation',
  '/academics',
  '/academics/programs',
  '/academics/undergraduate-programs',
  '/academics/graduate-programs',
  '/academics/departments',
  '/admissions',
  '/admissions/undergraduate',
  '/admissions/graduate',
  '/admissions/international-students',
  '/admissions/tuition-fees',
  '/admissions/scholarships-and-financial-aid',
  '/research',
  '/research/centers',
  '/research/publications',
  '/student-life',
  '/student-life/clubs',
  '/student-life/residential-life',
  '/student-life/career-services',
  '/campus',
  '/faculty',
  '/contact',
];

export const DEFAULT_MAX_ATTEMPTS = 2;
export const DEFAULT_BACKOFF_UNIT_MS = 2000;
export const DEFAULT_POLITENESS_DELAY_MS = 1000;
export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

/** Documents are written only when cleaned text is strictly longer than this */
export const DEFAULT_MIN_CONTENT_LENGTH = 150;
export const DEFAULT_CHECKPOINT_EVERY = 10;
export const DEFAULT_MAX_PAGES = 300;

export const DEFAULT_OUTPUT_DIR = 'university_docs';
export const DEFAULT_STATE_FILE = 'crawl_state.json';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
