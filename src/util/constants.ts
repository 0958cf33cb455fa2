export const DEFAULT_BASE_URL = 'https://letterboxd.com';

// Cookie that carries the anti-forgery token, and the form field it goes in
export const CSRF_COOKIE_NAME = 'com.xk72.webparts.csrf';
export const CSRF_FIELD = '__csrf';

export const SUPPORTED_TMDB_CATEGORY = 'movie';

// Cache namespaces
export const LOCAL_ID_NAMESPACE = 'slug_to_local_id';
export const XREF_ID_NAMESPACE = 'url_to_xref_id';

export const paths = {
    login: '/user/login.do',
    dataExport: '/data/export',
    metadata: '/ajax/letterboxd-metadata/',
    saveDiaryEntry: '/s/save-diary-entry',
    search: (query: string) => `/s/search/${encodeURIComponent(query)}/`,
    filmPage: (slug: string) => `/film/${slug}/`,
    sidebarActions: (slug: string) => `/csi/film/${slug}/sidebar-user-actions/?esiAllowUser=true`,
    addToWatchlist: (slug: string) => `/film/${slug}/add-to-watchlist/`,
    removeFromWatchlist: (slug: string) => `/film/${slug}/remove-from-watchlist/`,
    watch: (localId: number) => `/s/film:${localId}/watch/`,
    like: (localId: number) => `/s/film:${localId}/like/`,
    rate: (localId: number) => `/s/film:${localId}/rate/`,
} as const;
