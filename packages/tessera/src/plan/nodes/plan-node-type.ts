export enum PlanNodeType {
	// Leaves
	TableScan = 'TableScan',
	Values = 'Values',
	Exchange = 'Exchange',
	MergeExchange = 'MergeExchange',
	ShuffleRead = 'ShuffleRead',

	// Row-at-a-time operators
	Filter = 'Filter',
	Project = 'Project',
	Unnest = 'Unnest',
	EnforceSingleRow = 'EnforceSingleRow',
	AssignUniqueId = 'AssignUniqueId',

	// Blocking operators
	Aggregation = 'Aggregation',
	GroupId = 'GroupId',
	Limit = 'Limit',
	TopN = 'TopN',
	OrderBy = 'OrderBy',
	Window = 'Window',

	// Joins
	HashJoin = 'HashJoin',
	NestedLoopJoin = 'NestedLoopJoin',
	MergeJoin = 'MergeJoin',

	// In-process redistribution
	LocalMerge = 'LocalMerge',
	LocalPartition = 'LocalPartition',

	// Sinks
	TableWrite = 'TableWrite',
	PartitionedOutput = 'PartitionedOutput',
	PartitionAndSerialize = 'PartitionAndSerialize',
	ShuffleWrite = 'ShuffleWrite',
}
