export interface Artist {
  external_urls?: {
    spotify: string;
  };
  href?: string;
  id: string;
  name: string;
  uri?: string;
}

export interface Album {
  album_type: string;
  artists: Artist[];
  external_urls?: {
    spotify: string;
  };
  href?: string;
  id: string;
  name: string;
  release_date: string;
  uri?: string;
}

// Local files and unavailable tracks come back with a null id
export interface Track {
  album?: Album;
  artists: Artist[];
  duration_ms?: number;
  explicit?: boolean;
  external_urls?: {
    spotify: string;
  };
  href?: string;
  id: string | null;
  is_local?: boolean;
  name: string;
  popularity?: number;
  uri?: string;
}

export interface PlaylistOwner {
  id: string;
  display_name?: string | null;
}

export interface Playlist {
  id: string;
  name: string;
  description: string | null;
  owner?: PlaylistOwner;
  public?: boolean | null;
  external_urls?: {
    spotify: string;
  };
  tracks?: {
    total: number;
  };
  uri?: string;
}

export interface PlaylistDetailsUpdate {
  name?: string;
  description?: string;
  public?: boolean;
}

/**
 * Spotify's envelope for paginated results.
 */
export interface Paging<T> {
  href: string;
  items: T[];
  limit: number;
  next: string | null;
  offset: number;
  previous: string | null;
  total: number;
}
