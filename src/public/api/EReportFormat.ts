export enum EReportFormat {
    text = "text",
    json = "json"
}
