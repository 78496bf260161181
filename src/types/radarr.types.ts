export interface RadarrAddOptions {
  searchForMovie: boolean
}

export interface RadarrPost {
  title: string
  qualityProfileId: number
  tmdbId: number
  rootFolderPath: string
  monitored: boolean
  addOptions: RadarrAddOptions
}
