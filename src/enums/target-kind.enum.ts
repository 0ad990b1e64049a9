export enum TargetKind {
    FILE = 'file',
    LINK = 'link',
}
