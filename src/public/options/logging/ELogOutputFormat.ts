export enum ELogOutputFormat {
    simple = "simple",
    json = "json"
}
