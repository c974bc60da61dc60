export { SourceDescriptorDto, SourceStatusDto } from './source-descriptor.dto';
export { UpdateSourceDto } from './update-source.dto';
